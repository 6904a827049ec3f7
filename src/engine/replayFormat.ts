export const SOLUTION_FORMAT_VERSION = 1 as const;

export type SolutionFileV1 = {
  formatVersion: typeof SOLUTION_FORMAT_VERSION;

  // ISO timestamp string
  createdAt: string;

  // One board text per token, in the parseBoard grammar
  boards: string[];

  // Compact move list, e.g. "UULR"
  moves: string;
};

export type SolutionFile = SolutionFileV1;
