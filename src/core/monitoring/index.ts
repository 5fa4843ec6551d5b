export * from './health.controller';
export * from './monitoring.module';
