#!/usr/bin/env node
import fs from "node:fs";
import { runCli } from "./solve";

process.exitCode = runCli(process.argv.slice(2), {
  readFile: (path) => fs.readFileSync(path, "utf8"),
  writeFile: (path, data) => fs.writeFileSync(path, data, "utf8"),
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  env: process.env,
});
