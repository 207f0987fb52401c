import * as fs from 'fs-extra';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_SITE_DOMAIN } from './defaults';
import { ConfigError } from './errors';
import type { Config, DatabaseSettings, SiteEntry, SiteOptions, ValidationError } from './types';

type Mapping = Record<string, unknown>;

const HOSTNAME_PATTERN = /^[a-zA-Z0-9-]+(\.[a-zA-Z0-9-]+)*$/;
// Names end up inside backtick-quoted SQL identifiers
const SQL_NAME_PATTERN = /^[^\s`'"\\]+$/;

export class ConfigParser {

  /**
   * Parse configuration file (YAML or JSON)
   */
  static async parseConfig(configPath: string): Promise<Config> {
    const document = await this.readDocument(configPath);
    return this.validateConfig(document);
  }

  /**
   * Read the raw document without validating it
   */
  static async readDocument(configPath: string): Promise<unknown> {
    const ext = path.extname(configPath).toLowerCase();

    if (ext !== '.yml' && ext !== '.yaml' && ext !== '.json') {
      throw new ConfigError(`Unsupported configuration file format: ${ext}. Supported formats: .yml, .yaml, .json`);
    }

    const content = await fs.readFile(configPath, 'utf-8');

    try {
      return ext === '.json' ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Invalid ${ext === '.json' ? 'JSON' : 'YAML'} in configuration file: ${errorMessage}`);
    }
  }

  /**
   * Validate the document structure and turn it into a typed configuration
   */
  static validateConfig(document: unknown): Config {
    const errors: ValidationError[] = [];

    if (!isMapping(document)) {
      errors.push({ field: 'document', message: 'Configuration must be a mapping with "sites" and "database" sections' });
      throw this.validationFailure(errors);
    }

    const sites: SiteEntry[] = [];
    const rawSites = document.sites;

    if (rawSites === undefined || rawSites === null) {
      errors.push({ field: 'sites', message: 'Configuration must contain a "sites" section' });
    } else if (!isMapping(rawSites)) {
      errors.push({ field: 'sites', message: '"sites" must be a mapping of domain to site options' });
    } else if (Object.keys(rawSites).length === 0) {
      errors.push({ field: 'sites', message: 'Sites section cannot be empty' });
    } else {
      for (const [domain, options] of Object.entries(rawSites)) {
        const entry = this.validateSite(domain, options, errors);
        if (entry) {
          sites.push(entry);
        }
      }
      this.checkDuplicates(sites, errors);
    }

    const database = this.validateDatabase(document.database, errors);

    if (errors.length > 0) {
      throw this.validationFailure(errors);
    }

    return { sites, database };
  }

  private static validationFailure(errors: ValidationError[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${errors.map(e =>
      e.site !== undefined
        ? `- Site ${e.site} (${e.field}): ${e.message}`
        : `- ${e.field}: ${e.message}`
    ).join('\n')}`, errors);
  }

  /**
   * Validate individual site configuration
   */
  private static validateSite(domain: string, raw: unknown, errors: ValidationError[]): SiteEntry | null {
    const errorCount = errors.length;

    if (domain !== DEFAULT_SITE_DOMAIN && !HOSTNAME_PATTERN.test(domain)) {
      errors.push({
        field: 'domain',
        message: 'Domain can only contain letters, numbers and hyphens, separated by dots',
        site: domain
      });
    }

    // A bare "example.com:" entry carries no options
    if (raw === null || raw === undefined) {
      return errors.length === errorCount ? { domain, options: {} } : null;
    }

    if (!isMapping(raw)) {
      errors.push({ field: 'options', message: 'Site options must be a mapping', site: domain });
      return null;
    }

    const options: SiteOptions = {};

    for (const field of ['database_name', 'database_user_name', 'database_password'] as const) {
      const value = raw[field];
      if (value === undefined || value === null) {
        continue;
      }
      // An unquoted YAML password such as 12345 arrives as a number
      if (field === 'database_password' && typeof value === 'number') {
        options[field] = String(value);
        continue;
      }
      if (typeof value !== 'string') {
        errors.push({ field, message: 'Must be a string (quote numeric values)', site: domain });
        continue;
      }
      if (field !== 'database_password' && value !== '' && !SQL_NAME_PATTERN.test(value)) {
        errors.push({ field, message: 'Cannot contain whitespace, quotes, backticks or backslashes', site: domain });
        continue;
      }
      options[field] = value;
    }

    const alias = raw.alias;
    if (typeof alias === 'string') {
      options.alias = [alias];
    } else if (Array.isArray(alias) && alias.every((a): a is string => typeof a === 'string')) {
      options.alias = alias;
    } else if (alias !== undefined && alias !== null) {
      errors.push({ field: 'alias', message: 'Alias must be a hostname or a list of hostnames', site: domain });
    }

    return errors.length === errorCount ? { domain, options } : null;
  }

  /**
   * Validate the "database" section
   */
  private static validateDatabase(raw: unknown, errors: ValidationError[]): DatabaseSettings {
    if (raw === undefined || raw === null) {
      errors.push({ field: 'database', message: 'Configuration must contain a "database" section' });
      return {};
    }

    if (!isMapping(raw)) {
      errors.push({ field: 'database', message: '"database" must be a mapping' });
      return {};
    }

    const settings: DatabaseSettings = {};

    if (raw.root_password_random !== undefined && raw.root_password_random !== null) {
      if (typeof raw.root_password_random === 'boolean') {
        settings.root_password_random = raw.root_password_random;
      } else {
        errors.push({ field: 'database.root_password_random', message: 'Must be true or false' });
      }
    }

    if (raw.root_password !== undefined && raw.root_password !== null) {
      if (typeof raw.root_password === 'string' || typeof raw.root_password === 'number') {
        settings.root_password = String(raw.root_password);
      } else {
        errors.push({ field: 'database.root_password', message: 'Must be a string or a number' });
      }
    }

    return settings;
  }

  /**
   * Check for database names and users shared by more than one site
   */
  private static checkDuplicates(sites: SiteEntry[], errors: ValidationError[]): void {
    const dbNames = new Set<string>();
    const dbUsers = new Set<string>();

    for (const { domain, options } of sites) {
      const safeName = domain.replace(/\./g, '_');
      const dbName = options.database_name || safeName;
      const dbUser = options.database_user_name || safeName;

      if (dbNames.has(dbName)) {
        errors.push({ field: 'database_name', message: `Duplicate database name: ${dbName}`, site: domain });
      } else {
        dbNames.add(dbName);
      }

      if (dbUsers.has(dbUser)) {
        errors.push({ field: 'database_user_name', message: `Duplicate database user: ${dbUser}`, site: domain });
      } else {
        dbUsers.add(dbUser);
      }
    }
  }
}

function isMapping(value: unknown): value is Mapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
