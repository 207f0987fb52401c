import { ApacheManager } from './apache-manager';
import { DatabaseManager } from './database-manager';
import { DEFAULT_PATHS, supervisorCommand } from './defaults';
import type { ProcessRunner } from './process-runner';
import { SiteSettings } from './site-settings';
import type { Config, ProvisionPaths, SiteSetupResult } from './types';
import { WordPressManager } from './wordpress-manager';

export interface LampBuildResult {
  sites: SiteSettings[];
  rootPassword: string;
  vhostFiles: string[];
}

export interface LampBuilderOptions {
  paths?: Partial<ProvisionPaths>;
  verbose?: boolean;
}

/**
 * Provisions the container: MariaDB, Apache and one WordPress install per
 * configured site.
 */
export class LampBuilder {
  private config: Config;
  private runner: ProcessRunner;
  private paths: ProvisionPaths;
  private verbose: boolean;

  constructor(config: Config, runner: ProcessRunner, options: LampBuilderOptions = {}) {
    this.config = config;
    this.runner = runner;
    this.paths = { ...DEFAULT_PATHS, ...options.paths };
    this.verbose = options.verbose ?? false;
  }

  parseSites(): SiteSettings[] {
    return this.config.sites.map(({ domain, options }) =>
      new SiteSettings(domain, options, this.paths.sitesRoot)
    );
  }

  /**
   * Configure MariaDB and Apache for every site
   */
  async buildLamp(): Promise<LampBuildResult> {
    const sites = this.parseSites();
    console.log(`📋 Found ${sites.length} site(s): ${sites.map(s => s.domain).join(', ')}`);

    if (this.verbose) {
      for (const site of sites) {
        console.log(`   - ${site.domain}: database ${site.dbName}, user ${site.dbUser}, folder ${site.siteFolder}`);
        if (site.aliases.length > 0) {
          console.log(`     aliases: ${site.aliases.join(', ')}`);
        }
      }
    }

    const databaseManager = new DatabaseManager(this.paths.sqlInitFile, this.runner);
    await databaseManager.prepareSiteDbScripts(sites);
    const rootPassword = await databaseManager.initDatabase(this.config.database);

    const apacheManager = new ApacheManager(this.paths.apacheSitesDir);
    const vhostFiles = await apacheManager.writeVirtualHosts(sites);

    return { sites, rootPassword, vhostFiles };
  }

  /**
   * Install WordPress for the sites that do not have a folder yet
   */
  async setupWordPress(sites: SiteSettings[]): Promise<SiteSetupResult[]> {
    const wordpressManager = new WordPressManager(this.runner);
    const results = await wordpressManager.setupAllSites(sites);
    const summary = wordpressManager.getSummary(results);

    console.log(
      `\n📊 WordPress setup: ${summary.successful} installed, ${summary.skipped} already present, ${summary.failed} failed`,
    );
    return results;
  }

  /**
   * Build the stack, start supervisord, set up the sites while it runs and
   * resolve with supervisord's exit code.
   */
  async run(): Promise<number> {
    const { sites } = await this.buildLamp();

    console.log(`\n🚀 Starting supervisord with ${this.paths.supervisorConfig}`);
    const supervisor = this.runner.start(supervisorCommand(this.paths.supervisorConfig));

    await this.setupWordPress(sites);

    const exitCode = await supervisor.wait();
    console.log(`🔌 supervisord exited with code ${exitCode}`);
    return exitCode;
  }
}
