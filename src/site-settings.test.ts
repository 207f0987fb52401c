import { describe, expect, it } from 'vitest';
import { SiteSettings } from './site-settings';

describe('SiteSettings', () => {
  it('derives every database credential from the domain when no options are given', () => {
    const site = new SiteSettings('blog.example.com', null);

    expect(site.safeName).toBe('blog_example_com');
    expect(site.dbName).toBe('blog_example_com');
    expect(site.dbUser).toBe('blog_example_com');
    expect(site.dbPassword).toMatch(/^[a-z]{32}$/);
    expect(site.aliases).toEqual([]);
    expect(site.siteFolder).toBe('/var/www/html/blog.example.com');
  });

  it('uses explicit options over derived values', () => {
    const site = new SiteSettings('a.com', {
      database_name: 'shop',
      database_user_name: 'shop_user',
      database_password: 'test-secret',
      alias: ['www.a.com'],
    });

    expect(site.dbName).toBe('shop');
    expect(site.dbUser).toBe('shop_user');
    expect(site.dbPassword).toBe('test-secret');
    expect(site.aliases).toEqual(['www.a.com']);
  });

  it('never leaves a credential empty for any subset of options', () => {
    const subsets = [
      {},
      { database_name: 'db' },
      { database_user_name: 'user' },
      { database_password: 'pw' },
      { database_name: '', database_user_name: '', database_password: '' },
    ];

    for (const options of subsets) {
      const site = new SiteSettings('x.org', options);
      expect(site.dbName.length).toBeGreaterThan(0);
      expect(site.dbUser.length).toBeGreaterThan(0);
      expect(site.dbPassword.length).toBeGreaterThan(0);
    }
  });

  it('places the site folder under a custom sites root', () => {
    const site = new SiteSettings('a.com', {}, '/srv/sites');
    expect(site.siteFolder).toBe('/srv/sites/a.com');
  });

  describe('dbScript', () => {
    it('creates the database and user and grants access from any host', () => {
      const site = new SiteSettings('a.com', { database_password: 'test-secret' });

      expect(site.dbScript()).toBe(
        'CREATE DATABASE IF NOT EXISTS `a_com`;\n' +
        "CREATE USER IF NOT EXISTS `a_com`@`%` IDENTIFIED BY 'test-secret';\n" +
        'GRANT ALL PRIVILEGES ON `a_com`.* TO `a_com`@`%`;\n',
      );
    });

    it('contains exactly one statement of each kind', () => {
      const script = new SiteSettings('b.net', { database_name: 'bdb', database_user_name: 'bu' }).dbScript();

      expect(script.match(/CREATE DATABASE/g)).toHaveLength(1);
      expect(script.match(/CREATE USER/g)).toHaveLength(1);
      expect(script.match(/GRANT/g)).toHaveLength(1);
      expect(script).toContain('GRANT ALL PRIVILEGES ON `bdb`.* TO `bu`@`%`;');
    });

    it('doubles single quotes in the password', () => {
      const site = new SiteSettings('a.com', { database_password: "it's" });
      expect(site.dbScript()).toContain("IDENTIFIED BY 'it''s';");
    });

    it('escapes backslashes so the password literal always closes', () => {
      const site = new SiteSettings('a.com', { database_password: 'abc\\' });
      expect(site.dbScript()).toContain("IDENTIFIED BY 'abc\\\\';\n");
    });

    it('escapes backslashes before doubling quotes', () => {
      const site = new SiteSettings('a.com', { database_password: "a\\'b" });
      expect(site.dbScript()).toContain("IDENTIFIED BY 'a\\\\''b';");
    });
  });

  describe('apacheConfig', () => {
    it('names the domain and lists aliases in order', () => {
      const site = new SiteSettings('a.com', { alias: ['www.a.com', 'a.net'] });

      expect(site.apacheConfig()).toBe(
        '<VirtualHost *:80>\n' +
        '    DocumentRoot "/var/www/html/a.com"\n' +
        '    ServerName a.com\n' +
        '    ServerAlias www.a.com\n' +
        '    ServerAlias a.net\n' +
        '</VirtualHost>\n',
      );
    });

    it('omits ServerName and ServerAlias for the default site', () => {
      const site = new SiteSettings('default', { alias: ['ignored.com'] });
      const config = site.apacheConfig();

      expect(site.isDefault).toBe(true);
      expect(config).not.toContain('ServerName');
      expect(config).not.toContain('ServerAlias');
      expect(config).toBe(
        '<VirtualHost *:80>\n' +
        '    DocumentRoot "/var/www/html/default"\n' +
        '</VirtualHost>\n',
      );
    });

    it('writes no alias lines when there are none', () => {
      const config = new SiteSettings('solo.io', null).apacheConfig();
      expect(config.match(/ServerAlias/g)).toBeNull();
      expect(config.match(/ServerName solo\.io/g)).toHaveLength(1);
    });
  });
});
