export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  details?: Record<string, unknown>;
};
