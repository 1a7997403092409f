import { createSettings, type Section } from '../core/settings/index.ts';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

/**
 * デモ用の設定ツリー
 *
 * - server.port: `-p/--port` と環境変数 DEMO_PORT
 * - server.host: `--host` と別名 `-H`（HandlerEntry 経由）
 * - cache.enabled: `--cache`（store_true）
 * - _internal: hidden セクション（オプション登録されない）
 */
export function createDemoSettings(): Section {
  const settings = createSettings('settings-tree demo');

  settings.addItem('logLevel', 'info', {
    argvar: ['-l', '--log-level'],
    envvar: 'DEMO_LOG_LEVEL',
    choices: LOG_LEVELS,
    help: 'log level',
  });
  settings.addItem('_token', 'placeholder-token', { envvar: 'DEMO_TOKEN' });

  const server = settings.addSection('server', 'HTTP server');
  server.addItem('port', 8080, {
    argvar: ['-p', '--port'],
    envvar: 'DEMO_PORT',
    type: Number,
    metavar: 'port',
    help: 'listen port',
  });
  server
    .addItem('host', '127.0.0.1', { argvar: '--host', metavar: 'host', help: 'listen address' })
    .addHandler({ argvar: '-H', dest: 'host_alias', metavar: 'host' });

  const cache = settings.addSection('cache', 'response cache');
  cache.addItem('enabled', false, { argvar: '--cache', action: 'store_true', help: 'enable the cache' });
  cache.addItem('ttl', 60, { hidden: true });

  const internal = settings.addSection('_internal');
  internal.addItem('build', 'dev', { argvar: '--build' });

  return settings;
}
