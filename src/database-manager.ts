import * as fs from 'fs-extra';
import * as path from 'path';
import { DATABASE_INIT_COMMAND } from './defaults';
import { ConfigError, DatabaseInitError } from './errors';
import { randomPassword } from './password-generator';
import type { ProcessRunner } from './process-runner';
import type { SiteSettings } from './site-settings';
import type { DatabaseSettings } from './types';

/**
 * Pick the MariaDB root password from the "database" section.
 * root_password_random wins over root_password.
 */
export function resolveRootPassword(settings: DatabaseSettings): string {
  let password: string | undefined;

  if (settings.root_password_random === true) {
    password = randomPassword();
  } else if (settings.root_password !== undefined) {
    password = settings.root_password;
  }

  if (password === undefined || password.length === 0) {
    throw new ConfigError('In database section, please set root_password or use root_password_random: true', [
      { field: 'database.root_password', message: 'No root password could be resolved' }
    ]);
  }

  return password;
}

export class DatabaseManager {
  private sqlInitFile: string;
  private runner: ProcessRunner;

  constructor(sqlInitFile: string, runner: ProcessRunner) {
    this.sqlInitFile = sqlInitFile;
    this.runner = runner;
  }

  /**
   * Append the database script of every site to the SQL file MariaDB runs on
   * first initialization. The file is never truncated; every statement in it
   * can be replayed.
   */
  async prepareSiteDbScripts(sites: SiteSettings[]): Promise<void> {
    console.log(`📊 Writing database scripts for ${sites.length} site(s) to ${this.sqlInitFile}`);

    try {
      await fs.ensureDir(path.dirname(this.sqlInitFile));
      await fs.appendFile(this.sqlInitFile, sites.map(site => site.dbScript()).join(''));
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to write database scripts to ${this.sqlInitFile}: ${errorMessage}`);
    }
  }

  /**
   * Initialize the database server if it is not already initialized.
   * Resolves with the root password it was initialized with.
   */
  async initDatabase(settings: DatabaseSettings): Promise<string> {
    console.log('🔧 Initializing database ... ');

    const rootPassword = resolveRootPassword(settings);

    const exitCode = await this.runner.run({
      ...DATABASE_INIT_COMMAND,
      env: { MYSQL_ROOT_PASSWORD: rootPassword },
    });

    if (exitCode !== 0) {
      throw new DatabaseInitError(exitCode);
    }

    console.log('✅ Database is set up');
    return rootPassword;
  }
}
