export interface SiteOptions {
  // Optional: if not provided, the domain with dots replaced by underscores is used
  database_name?: string;
  // Optional: if not provided, the domain with dots replaced by underscores is used
  database_user_name?: string;
  // Optional: if not provided, a random password is generated on every run
  database_password?: string;
  alias?: string[];
}

export interface DatabaseSettings {
  root_password_random?: boolean;
  // Only effective when root_password_random is not true
  root_password?: string;
}

export interface SiteEntry {
  domain: string;
  options: SiteOptions;
}

export interface Config {
  // Keeps the order in which the sites appear in the configuration file
  sites: SiteEntry[];
  database: DatabaseSettings;
}

export interface ProvisionPaths {
  sqlInitFile: string;
  apacheSitesDir: string;
  sitesRoot: string;
  supervisorConfig: string;
}

export interface ProcessCommand {
  program: string;
  args: string[];
  cwd?: string;
  // Layered over the environment the launcher inherits
  env?: Record<string, string>;
}

export interface SiteSetupResult {
  domain: string;
  status: 'success' | 'failed' | 'skipped';
  site_folder: string;
  exit_code?: number;
}

export interface ValidationError {
  field: string;
  message: string;
  site?: string;
}
