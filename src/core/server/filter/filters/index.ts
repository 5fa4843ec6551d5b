export * from './cors.filter';
export * from './trace.filter';
export * from './cache-request-body.filter';
export * from './tenant-context.filter';
export * from './api-access-log.filter';
export * from './demo.filter';
