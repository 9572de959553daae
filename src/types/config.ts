/** Configuration types — layered config system. */
export type OutputFormat = "human" | "jsonl";

export type HygieneConfig = {
  schema_version: string;
  remote: string;
  stable_count: number;
  automation_author: string;
  label_prefix: string;
  api_url: string;
  page_size: number;
  /** `owner/name`; inferred from the remote URL when absent. */
  repository?: string;
};
