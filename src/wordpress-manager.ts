import * as fs from 'fs-extra';
import { SITE_SETUP_COMMAND, WORDPRESS_DB_HOST } from './defaults';
import type { ProcessRunner } from './process-runner';
import type { SiteSettings } from './site-settings';
import type { SiteSetupResult } from './types';

export class WordPressManager {
  private runner: ProcessRunner;

  constructor(runner: ProcessRunner) {
    this.runner = runner;
  }

  /**
   * Install WordPress into every site folder that does not exist yet
   */
  async setupAllSites(sites: SiteSettings[]): Promise<SiteSetupResult[]> {
    console.log(`\n🌐 Setting up WordPress for ${sites.length} site(s)...`);

    const results: SiteSetupResult[] = [];

    for (let i = 0; i < sites.length; i++) {
      const site = sites[i];
      console.log(`\n📦 [${i + 1}/${sites.length}] ${site.domain}`);
      results.push(await this.setupSite(site));
    }

    return results;
  }

  /**
   * An existing folder counts as an installed site. A setup script that
   * failed halfway is not retried on the next start.
   */
  async setupSite(site: SiteSettings): Promise<SiteSetupResult> {
    if (await fs.pathExists(site.siteFolder)) {
      console.log(`   ⚠️  ${site.siteFolder} already exists, skipping`);
      return { domain: site.domain, status: 'skipped', site_folder: site.siteFolder };
    }

    await fs.ensureDir(site.siteFolder);

    const exitCode = await this.runner.run({
      ...SITE_SETUP_COMMAND,
      cwd: site.siteFolder,
      env: {
        WORDPRESS_DB_USER: site.dbUser,
        WORDPRESS_DB_PASSWORD: site.dbPassword,
        WORDPRESS_DB_NAME: site.dbName,
        WORDPRESS_DB_HOST: WORDPRESS_DB_HOST,
      },
    });

    if (exitCode !== 0) {
      console.error(`   ❌ ${site.domain}: ${SITE_SETUP_COMMAND.program} exited with code ${exitCode}`);
      return { domain: site.domain, status: 'failed', site_folder: site.siteFolder, exit_code: exitCode };
    }

    console.log(`   ✅ ${site.domain}: WordPress set up in ${site.siteFolder}`);
    return { domain: site.domain, status: 'success', site_folder: site.siteFolder, exit_code: exitCode };
  }

  getSummary(results: SiteSetupResult[]): { total: number; successful: number; failed: number; skipped: number } {
    return {
      total: results.length,
      successful: results.filter(r => r.status === 'success').length,
      failed: results.filter(r => r.status === 'failed').length,
      skipped: results.filter(r => r.status === 'skipped').length,
    };
  }
}
