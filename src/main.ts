import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { networkInterfaces } from 'os';
import { AppModule } from './app.module';
import { WebConfigService } from './core/config';
import { AppLoggerService } from './core/logger';
import { useFormBodyParser } from './core/server/http/form-body-parser';

/**
 * 获取本机局域网 IP 地址
 */
function getLocalIpAddress(): string {
  const nets = networkInterfaces();
  for (const name of Object.keys(nets)) {
    const netInfo = nets[name];
    if (!netInfo) continue;

    for (const netInterface of netInfo) {
      // 跳过非 IPv4 和内部地址
      if (netInterface.family === 'IPv4' && !netInterface.internal) {
        return netInterface.address;
      }
    }
  }
  return 'localhost';
}

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true, // 缓冲日志直到 Logger 设置完成
    // JSON 请求体由过滤器链读取并缓存，这里关闭默认解析
    bodyParser: false,
  });

  // AppLoggerService 使用 TRANSIENT 作用域，需要用 resolve() 而非 get()
  const appLogger = await app.resolve(AppLoggerService);
  app.useLogger(appLogger);

  const config = app.get(WebConfigService);

  // 表单请求仍走 express 解析
  useFormBodyParser(app, config.web);

  const port = config.port;

  await app.listen(port);

  const localIp = getLocalIpAddress();

  console.log('========================================');
  console.log(`🚀 ${config.web.applicationName} 已启动`);
  console.log(`📍 监听端口: ${port}`);
  console.log(`🌍 运行环境: ${config.nodeEnv}`);
  console.log(`🔗 本地访问: http://localhost:${port}`);
  console.log(`🌐 局域网访问: http://${localIp}:${port}`);
  console.log(`🩺 健康检查: http://${localIp}:${port}/actuator/health`);
  console.log(`🧪 演示模式: ${config.web.demoEnabled ? '开启' : '关闭'}`);
  console.log('========================================');
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('服务启动失败', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
