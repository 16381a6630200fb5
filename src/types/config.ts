/** Full plugin configuration, after defaults and overrides are applied. */
export interface PluginConfig {
  buck2: {
    binary: string;
    command_timeout_seconds: number;
  };
  discovery: {
    build_file_name: string;
    ignore_dirs: string[];
  };
}
