export type UnitPrimary =
  | { kind: "directory"; path: string }
  | { kind: "file"; path: string }
  | { kind: "files"; paths: string[] };

export interface AnalysisUnit {
  readonly id: string;
  // Name handed to the tool (e.g. a BIDS participant label without the sub- prefix).
  readonly label: string;
  readonly primary: UnitPrimary;
  readonly controlFiles: readonly string[];
  // Per-unit configuration file found inside the unit's directory.
  readonly marker: string | null;
  readonly repetition: number | null;
}
