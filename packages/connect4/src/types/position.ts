/** Grid coordinate; rows count up from the bottom. */
export interface Position {
  readonly row: number;
  readonly col: number;
}

export type Line = readonly Position[];
