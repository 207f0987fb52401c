import * as fs from 'fs-extra';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ApacheManager, FALLBACK_DEFAULT_VHOST } from './apache-manager';
import { SiteSettings } from './site-settings';
import { makeTempDir } from './test-utils';

describe('ApacheManager', () => {
  let dir: string;
  let manager: ApacheManager;

  beforeEach(async () => {
    dir = await makeTempDir();
    manager = new ApacheManager(path.join(dir, 'sites-enabled'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it('writes one file per site plus the 404 fallback', async () => {
    const site = new SiteSettings('a.com', { alias: ['www.a.com'] });

    const written = await manager.writeVirtualHosts([site]);

    expect(written).toEqual([manager.configPath('a.com'), manager.configPath('default')]);
    expect(await fs.readFile(manager.configPath('a.com'), 'utf-8')).toBe(site.apacheConfig());
    expect(await fs.readFile(manager.configPath('default'), 'utf-8')).toBe(FALLBACK_DEFAULT_VHOST);
  });

  it('lets the fallback take default.conf when a default site follows another site', async () => {
    const sites = [new SiteSettings('a.com', { alias: ['www.a.com'] }), new SiteSettings('default', null)];

    const written = await manager.writeVirtualHosts(sites);

    expect(written).toEqual([manager.configPath('a.com'), manager.configPath('default')]);
    const defaultConf = await fs.readFile(manager.configPath('default'), 'utf-8');
    expect(defaultConf).toBe(FALLBACK_DEFAULT_VHOST);
    expect(defaultConf).toContain('<VirtualHost _default_:80>');
    expect(defaultConf.match(/Redirect 404 \//g)).toHaveLength(2);
  });

  it('keeps a default site listed first instead of the fallback', async () => {
    const site = new SiteSettings('default', null);

    const written = await manager.writeVirtualHosts([site]);

    expect(written).toEqual([manager.configPath('default')]);
    expect(await fs.readFile(manager.configPath('default'), 'utf-8')).toBe(site.apacheConfig());
  });

  it('never overwrites an existing vhost file', async () => {
    await manager.writeVirtualHosts([new SiteSettings('a.com', { alias: ['first.a.com'] })]);

    const written = await manager.writeVirtualHosts([new SiteSettings('a.com', { alias: ['second.a.com'] })]);

    expect(written).toEqual([]);
    const content = await fs.readFile(manager.configPath('a.com'), 'utf-8');
    expect(content).toContain('ServerAlias first.a.com');
    expect(content).not.toContain('second.a.com');
  });

  it('leaves a hand-written default.conf alone', async () => {
    await fs.outputFile(manager.configPath('default'), '# custom\n');

    await manager.writeVirtualHosts([new SiteSettings('a.com', null)]);

    expect(await fs.readFile(manager.configPath('default'), 'utf-8')).toBe('# custom\n');
  });

  it('synthesizes a named and a wildcard vhost that both answer 404', () => {
    expect(FALLBACK_DEFAULT_VHOST.match(/Redirect 404 \//g)).toHaveLength(2);
    expect(FALLBACK_DEFAULT_VHOST).toContain('ServerName default');
    expect(FALLBACK_DEFAULT_VHOST).toContain('<VirtualHost _default_:80>');
  });
});
