/**
 * Configuration Loader
 *
 * 从命令行参数和环境变量加载配置（命令行优先）
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { GatewayConfig, PartialGatewayConfig } from './types';

/**
 * dev-gateway 应用目录
 */
const APP_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

/**
 * 默认配置
 */
export const DEFAULT_CONFIG: GatewayConfig = {
  port: 3000,
  staticDir: path.join(APP_DIR, 'static'),
  enforceCapacity: true,
};

type ParsedArgs = PartialGatewayConfig & { help?: boolean };

function parsePort(value: string | undefined, source: string): number {
  const port = Number.parseInt(value ?? '', 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port from ${source}: ${value ?? '(missing)'}`);
  }
  return port;
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('-')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

/**
 * 解析命令行参数
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const config: ParsedArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--port':
      case '-p':
        config.port = parsePort(requireValue(argv, ++i, arg), arg);
        break;

      case '--static-dir':
        config.staticDir = path.resolve(requireValue(argv, ++i, arg));
        break;

      case '--seed':
        config.seedFile = path.resolve(requireValue(argv, ++i, arg));
        break;

      case '--no-capacity':
        config.enforceCapacity = false;
        break;

      case '--timing-log':
        config.timingLogFile = path.resolve(requireValue(argv, ++i, arg));
        break;

      case '--help':
      case '-h':
        config.help = true;
        break;

      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return config;
}

/**
 * 从环境变量加载配置
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialGatewayConfig {
  const config: PartialGatewayConfig = {};

  if (env.DEV_GATEWAY_PORT) {
    config.port = parsePort(env.DEV_GATEWAY_PORT, 'DEV_GATEWAY_PORT');
  }

  if (env.DEV_GATEWAY_STATIC_DIR) {
    config.staticDir = path.resolve(env.DEV_GATEWAY_STATIC_DIR);
  }

  if (env.ACTIVITIES_SEED_FILE) {
    config.seedFile = path.resolve(env.ACTIVITIES_SEED_FILE);
  }

  if (env.ACTIVITIES_ENFORCE_CAPACITY) {
    config.enforceCapacity = env.ACTIVITIES_ENFORCE_CAPACITY !== 'false';
  }

  if (env.DEV_GATEWAY_TIMING_LOG) {
    config.timingLogFile = path.resolve(env.DEV_GATEWAY_TIMING_LOG);
  }

  return config;
}

/**
 * 合并配置
 */
export function mergeConfig(base: GatewayConfig, override: PartialGatewayConfig): GatewayConfig {
  return {
    port: override.port ?? base.port,
    staticDir: override.staticDir ?? base.staticDir,
    seedFile: override.seedFile ?? base.seedFile,
    enforceCapacity: override.enforceCapacity ?? base.enforceCapacity,
    timingLogFile: override.timingLogFile ?? base.timingLogFile,
  };
}

/**
 * 加载完整配置
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  // 1. 从默认配置开始
  let config: GatewayConfig = { ...DEFAULT_CONFIG };

  const { help, ...argsConfig } = parseArgs(argv);
  if (help) {
    printHelp();
    process.exit(0);
  }

  // 2. 从环境变量加载
  config = mergeConfig(config, loadEnvConfig(env));

  // 3. 应用命令行参数（最高优先级）
  config = mergeConfig(config, argsConfig);

  return config;
}

/**
 * 打印帮助信息
 */
function printHelp() {
  console.log(`
Dev Gateway - local HTTP server for the activities API

Usage:
  tsx apps/dev-gateway/src/index.ts [options]

Options:
  -p, --port <port>       Gateway port (default: 3000)
  --static-dir <dir>      Directory served under /static (default: apps/dev-gateway/static)
  --seed <file>           Activity seed JSON file (default: bundled seed)
  --no-capacity           Accept signups past max_participants
  --timing-log <file>     Append per-request timing breakdowns to a file
  -h, --help              Show help

Environment Variables:
  DEV_GATEWAY_PORT              Gateway port
  DEV_GATEWAY_STATIC_DIR        Static directory
  ACTIVITIES_SEED_FILE          Activity seed JSON file
  ACTIVITIES_ENFORCE_CAPACITY   "false" to accept signups past capacity
  DEV_GATEWAY_TIMING_LOG        Timing log file
`);
}
