import * as path from 'path';
import { DEFAULT_PATHS, DEFAULT_SITE_DOMAIN } from './defaults';
import { randomPassword } from './password-generator';
import type { SiteOptions } from './types';

/**
 * One site from the "sites" section of the configuration file, with every
 * database credential resolved.
 */
export class SiteSettings {
  readonly domain: string;
  readonly safeName: string;
  readonly dbName: string;
  readonly dbUser: string;
  readonly dbPassword: string;
  readonly aliases: readonly string[];
  readonly siteFolder: string;

  constructor(domain: string, options?: SiteOptions | null, sitesRoot: string = DEFAULT_PATHS.sitesRoot) {
    const settings = options ?? {};

    this.domain = domain;
    this.safeName = domain.replace(/\./g, '_');
    this.dbName = nonEmpty(settings.database_name) ?? this.safeName;
    this.dbUser = nonEmpty(settings.database_user_name) ?? this.safeName;
    this.dbPassword = nonEmpty(settings.database_password) ?? randomPassword();
    this.aliases = Object.freeze([...(settings.alias ?? [])]);
    this.siteFolder = path.posix.join(sitesRoot, domain);
  }

  get isDefault(): boolean {
    return this.domain === DEFAULT_SITE_DOMAIN;
  }

  /**
   * SQL that creates the site's database and user. Every statement can be
   * replayed against a server that already has them.
   */
  dbScript(): string {
    // Backslash escapes inside a MariaDB string literal
    const password = this.dbPassword.replace(/\\/g, '\\\\').replace(/'/g, "''");
    return [
      `CREATE DATABASE IF NOT EXISTS \`${this.dbName}\`;`,
      `CREATE USER IF NOT EXISTS \`${this.dbUser}\`@\`%\` IDENTIFIED BY '${password}';`,
      `GRANT ALL PRIVILEGES ON \`${this.dbName}\`.* TO \`${this.dbUser}\`@\`%\`;`,
      '',
    ].join('\n');
  }

  /**
   * Apache virtual host on port 80. The "default" site has no ServerName so
   * it catches every request no other vhost claims.
   */
  apacheConfig(): string {
    const lines = ['<VirtualHost *:80>', `    DocumentRoot "${this.siteFolder}"`];

    if (!this.isDefault) {
      lines.push(`    ServerName ${this.domain}`);
      for (const alias of this.aliases) {
        lines.push(`    ServerAlias ${alias}`);
      }
    }

    lines.push('</VirtualHost>', '');
    return lines.join('\n');
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}
