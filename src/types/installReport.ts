export type ComponentStatus = "compiled" | "failed" | "missing" | "skipped";

export interface ComponentReport {
  component: string;
  optional: boolean;
  status: ComponentStatus;
  exit_code: number | null;
  errors: string[];
  warnings: string[];
}

export interface InstallReport {
  schema_version: "1.0";
  release_id: string;
  archive_path: string;
  source_dir: string;
  compiled_dir: string;
  strict_on_error: boolean;
  started_at: string;
  ended_at: string;
  compiled_count: number;
  verdict: "success" | "failed";
  components: ComponentReport[];
}
