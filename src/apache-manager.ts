import * as fs from 'fs-extra';
import * as path from 'path';
import { DEFAULT_SITE_DOMAIN } from './defaults';
import type { SiteSettings } from './site-settings';

// Requests whose Host header matches no site get a 404 instead of whichever
// vhost Apache happens to load first
export const FALLBACK_DEFAULT_VHOST = `<VirtualHost *:80>
  ServerName default
  Redirect 404 /
</VirtualHost>
<VirtualHost _default_:80>
  Redirect 404 /
</VirtualHost>
`;

export class ApacheManager {
  private sitesDir: string;

  constructor(sitesDir: string) {
    this.sitesDir = sitesDir;
  }

  configPath(domain: string): string {
    return path.join(this.sitesDir, `${domain}.conf`);
  }

  /**
   * Write a vhost file for every site that does not have one yet. After each
   * site the 404 fallback takes default.conf if nothing holds it, so a
   * "default" site only serves the catch-all when it is listed first.
   * Returns the paths that were written.
   */
  async writeVirtualHosts(sites: SiteSettings[]): Promise<string[]> {
    console.log(`🌐 Configuring Apache virtual hosts in ${this.sitesDir}`);
    await fs.ensureDir(this.sitesDir);

    const written: string[] = [];
    const defaultPath = this.configPath(DEFAULT_SITE_DOMAIN);

    for (const site of sites) {
      const confPath = this.configPath(site.domain);
      if (await this.writeIfAbsent(confPath, site.apacheConfig())) {
        console.log(`   ✅ ${site.domain}: wrote ${confPath}`);
        written.push(confPath);
      } else {
        console.log(`   ⚠️  ${site.domain}: ${confPath} already exists, keeping it`);
      }

      if (await this.writeIfAbsent(defaultPath, FALLBACK_DEFAULT_VHOST)) {
        console.log(`   ✅ Wrote 404 fallback to ${defaultPath}`);
        written.push(defaultPath);
      }
    }

    return written;
  }

  private async writeIfAbsent(filePath: string, content: string): Promise<boolean> {
    try {
      // "wx" fails if the file exists, so an existing vhost is never replaced
      await fs.writeFile(filePath, content, { flag: 'wx' });
      return true;
    } catch (error) {
      if (isAlreadyExists(error)) {
        return false;
      }
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to write Apache config ${filePath}: ${errorMessage}`);
    }
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}
