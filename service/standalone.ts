/**
 * 去背景服务 - 纯 Node 入口
 * 用法: npx tsx service/standalone.ts
 * 或构建后: node dist-service/index.js
 */
import { loadServiceConfig } from './config';
import { startService } from './index';

const config = loadServiceConfig();

try {
  const { server, port } = await startService(config);
  process.stdout.write(JSON.stringify({ ready: true, port }) + '\n');
  console.log('[Removal Service] 就绪:', `http://${config.host}:${port}`, '模型', config.modelId);
  server.on('error', (e) => {
    console.error('[Removal Service] 运行异常:', e);
    process.exit(1);
  });
} catch (e) {
  console.error('[Removal Service] 启动失败:', e);
  process.exit(1);
}
