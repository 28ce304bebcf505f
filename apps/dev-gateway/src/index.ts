/**
 * Dev Gateway - Local HTTP server for the activities API
 *
 * 模拟 AWS API Gateway 的行为，用于本地开发和调试：
 * - HTTP API (REST API 代理到 activities-api handler)
 * - 静态前端 (/static/*)
 *
 * Usage:
 *   tsx apps/dev-gateway/src/index.ts [options]
 *   npm run dev:gateway
 */

import { loadConfig } from './config';
import { startGateway } from './http-gateway';

function main() {
  console.log('🚀 Dev Gateway\n');

  // 加载配置
  const config = loadConfig(process.argv.slice(2));

  console.log('📋 Configuration:');
  console.log(`   Port:         ${config.port}`);
  console.log(`   Static Dir:   ${config.staticDir}`);
  console.log(`   Seed File:    ${config.seedFile || '(bundled)'}`);
  console.log(`   Capacity:     ${config.enforceCapacity ? 'enforced' : 'not enforced'}`);
  console.log(`   Timing Log:   ${config.timingLogFile || '(console only)'}`);
  console.log('');

  const server = startGateway(config);

  console.log('🔄 Press Ctrl+C to stop\n');

  // 优雅关闭
  const shutdown = () => {
    console.log('\n👋 Shutting down...');
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

try {
  main();
} catch (err) {
  console.error('❌ Fatal error:', err);
  process.exit(1);
}
