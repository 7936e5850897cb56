/** Tool configuration, merged from config/*.yaml and PROVENANT_* variables. */
export type ProvenantConfig = {
  schema_version: string;
  registry_dir: string;
  registry_file: string;
  policy_file: string;
  lock_timeout_ms: number;
  stale_lock_ms: number;
  include: string[];
  exclude: string[];
  log_level: string;
};
