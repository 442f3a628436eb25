// Source location: 1-based line, 0-based column
export type Loc = {
  line: number;
  col: number;
};

// Rule violation; there is never an auto-fix payload
export type Diagnostic = {
  line: number;
  col: number;
  message: string;
  fix: null;
};
