/**
 * 服务端 - 统一导出
 */
export * from './exception';
export * from './http';
export * from './filter';
export * from './pipes';
export * from './response';
export * from './web.module';
