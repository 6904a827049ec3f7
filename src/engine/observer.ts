import type { SearchResult } from "./search";

export type GenerationInfo = {
  /** Generation just built (1 = one move from the start). */
  generation: number;

  /** Surviving turns carried into the next generation. */
  frontierSize: number;

  /** Children dropped as failed while building this generation. */
  pruned: number;
};

/**
 * Tracing hook passed into the search. Every callback is optional.
 */
export interface SearchObserver {
  onGeneration?(info: GenerationInfo): void;
  onFinished?(result: SearchResult): void;
}

export type LogFn = (line: string) => void;

export function createLogObserver(log: LogFn = (line) => console.log(line)): SearchObserver {
  return {
    onGeneration(info) {
      log(`[search] generation=${info.generation} frontier=${info.frontierSize} pruned=${info.pruned}`);
    },
    onFinished(result) {
      const moves = result.status === "solved" ? ` moves=${result.path.length}` : "";
      log(`[search] ${result.status} after ${result.generations} generations${moves}`);
    },
  };
}
