#!/usr/bin/env node

import { Command } from "commander";
import * as fs from "fs-extra";
import * as path from "path";
import { ConfigParser } from "./config-parser";
import { DEFAULT_CONFIG_FILE, DEFAULT_PATHS } from "./defaults";
import { LampBuilder } from "./lamp-builder";
import { ChildProcessRunner } from "./process-runner";

interface StartOptions {
  config: string;
  sqlFile: string;
  apacheDir: string;
  sitesRoot: string;
  supervisorConfig: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name("wp-lamp-entrypoint")
  .description(
    "Container entrypoint - provision MariaDB, Apache and WordPress for every site in the configuration file",
  )
  .version("1.0.0");

program
  .command("start", { isDefault: true })
  .description("Provision the LAMP stack, start supervisord and set up new WordPress sites")
  .option("-c, --config <file>", "Configuration file path (YAML or JSON)", DEFAULT_CONFIG_FILE)
  .option("--sql-file <file>", "SQL file MariaDB runs on first start", DEFAULT_PATHS.sqlInitFile)
  .option("--apache-dir <dir>", "Directory of enabled Apache sites", DEFAULT_PATHS.apacheSitesDir)
  .option("--sites-root <dir>", "Directory holding one folder per site", DEFAULT_PATHS.sitesRoot)
  .option("--supervisor-config <file>", "supervisord configuration file", DEFAULT_PATHS.supervisorConfig)
  .option("-v, --verbose", "Enable verbose logging")
  .action(async (options: StartOptions) => {
    const configPath = await resolveConfigPath(options.config);

    try {
      console.log(`📋 Reading configuration from: ${configPath}`);
      const config = await ConfigParser.parseConfig(configPath);

      const builder = new LampBuilder(config, new ChildProcessRunner(), {
        paths: {
          sqlInitFile: options.sqlFile,
          apacheSitesDir: options.apacheDir,
          sitesRoot: options.sitesRoot,
          supervisorConfig: options.supervisorConfig,
        },
        verbose: !!options.verbose,
      });

      const exitCode = await builder.run();
      process.exit(exitCode);
    } catch (error) {
      console.error(
        `❌ Provisioning failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      process.exit(1);
    }
  });

program
  .command("print")
  .description("Print every section of the configuration file")
  .option("-c, --config <file>", "Configuration file path (YAML or JSON)", DEFAULT_CONFIG_FILE)
  .action(async (options: { config: string }) => {
    const configPath = await resolveConfigPath(options.config);

    try {
      const document = await ConfigParser.readDocument(configPath);
      if (typeof document !== "object" || document === null) {
        console.log(String(document));
        return;
      }
      for (const [section, value] of Object.entries(document)) {
        console.log(`${section}:`, JSON.stringify(value, maskPasswords, 2));
      }
    } catch (error) {
      console.error(
        `❌ Could not read configuration: ${error instanceof Error ? error.message : String(error)}`,
      );
      process.exit(1);
    }
  });

function maskPasswords(key: string, value: unknown): unknown {
  return key.endsWith("password") && typeof value === "string" ? "********" : value;
}

async function resolveConfigPath(configOption: string): Promise<string> {
  const configPath = path.resolve(configOption);

  if (!(await fs.pathExists(configPath))) {
    console.error(`❌ Configuration file not found: ${configPath}`);
    console.error(
      "💡 Mount the site list at this path or use -c flag to specify a different file",
    );
    process.exit(1);
  }

  return configPath;
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
