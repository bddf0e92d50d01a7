import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { ConfigError, errorMessage } from '../errors';
import { loadProxyConfig } from './config';
import { FileRecorder } from './recorder';
import { RpcProxy } from './server';

interface ProxyArgs {
  configFile?: string;
  port?: number;
  host?: string;
}

export function parseProxyArgs(argv: string[]): ProxyArgs {
  const args = argv.slice(2);
  const raw: ProxyArgs = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      throw new ConfigError(`unexpected argument ${arg}`);
    }
    const eq = arg.indexOf('=');
    const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    let value: string | undefined = eq === -1 ? undefined : arg.slice(eq + 1);
    if (value === undefined && i + 1 < args.length) {
      value = args[i + 1];
      i += 1;
    }
    if (value === undefined) {
      throw new ConfigError(`--${key} needs a value`);
    }
    switch (key) {
      case 'config':
        raw.configFile = value;
        break;
      case 'port': {
        const port = Number(value);
        if (!Number.isInteger(port)) throw new ConfigError(`--port expects a number, got ${value}`);
        raw.port = port;
        break;
      }
      case 'host':
        raw.host = value;
        break;
      default:
        throw new ConfigError(`unknown option --${key}`);
    }
  }
  return raw;
}

async function main(argv: string[]): Promise<void> {
  dotenv.config();
  const args = parseProxyArgs(argv);
  const configFile = args.configFile ?? process.env.PROXY_CONFIG ?? 'proxy.config.yaml';
  const overrides: Record<string, unknown> = {};
  if (args.port !== undefined) overrides.port = args.port;
  if (args.host !== undefined) overrides.host = args.host;
  const settings = await loadProxyConfig(configFile, overrides);

  const recorder = settings.record && settings.recordFile ? new FileRecorder(settings.recordFile) : undefined;

  const proxy = new RpcProxy({ ...settings, recorder });
  await proxy.listen();
  console.log(`🔀 ${settings.mode} proxy on ${proxy.url} -> ${settings.targets.map((t) => `${t.name} (${t.url})`).join(', ')}`);

  const stop = (signal: string) => {
    console.log(`\n🛑 ${signal}, shutting down`);
    proxy.close().then(
      () => process.exit(0),
      (error) => {
        console.error(`❌ ${errorMessage(error)}`);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));
}

if (process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1])) {
  main(process.argv).catch((error) => {
    console.error(`❌ ${errorMessage(error)}`);
    process.exit(error instanceof ConfigError ? 2 : 1);
  });
}
