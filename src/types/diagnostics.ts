export type DiagnosticRule =
  | "missing-label"
  | "ambiguous-relation"
  | "dangling-reference"
  | "missing-new-marker"
  | "deprecated-referenced"
  | "naming-convention"
  | "object-property-literal"
  | "datatype-property-range"
  | "datatype-property-object"
  | "annotation-property-domain-range"
  | "mapping-kind-mismatch"
  | "change-note-malformed"
  | "change-note-unreleased"
  | "change-note-duplicate";

export interface Diagnostic {
  /** Compact identifier of the offending entity, e.g. `ex:Work`. */
  entity: string;
  message: string;
  rule: DiagnosticRule;
  severity: "warning" | "info";
}

export interface ValidationReport {
  id: string;
  timestamp: number;
  duration?: number;
  checkedEntities: number;
  warnings: Diagnostic[];
}
