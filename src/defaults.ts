import type { ProcessCommand, ProvisionPaths } from './types';

export const DEFAULT_CONFIG_FILE = '/etc/wp-docker-config.yml';

export const DEFAULT_PATHS: ProvisionPaths = {
  sqlInitFile: '/docker-entrypoint-initdb.d/wordpress-db_init.sql',
  apacheSitesDir: '/etc/apache2/sites-enabled',
  sitesRoot: '/var/www/html',
  supervisorConfig: '/etc/supervisor/conf.d/supervisord.conf',
};

export const DEFAULT_SITE_DOMAIN = 'default';

// WordPress reaches MariaDB over loopback inside the container
export const WORDPRESS_DB_HOST = '127.0.0.1';

export const RANDOM_PASSWORD_LENGTH = 32;

export const DATABASE_INIT_COMMAND: ProcessCommand = {
  program: 'init_mariadb.sh',
  args: ['mysqld'],
};

export const SITE_SETUP_COMMAND: ProcessCommand = {
  program: 'setup-wp.sh',
  args: ['apache2'],
};

export function supervisorCommand(configFile: string): ProcessCommand {
  return {
    program: '/usr/bin/supervisord',
    args: ['-c', configFile],
  };
}
