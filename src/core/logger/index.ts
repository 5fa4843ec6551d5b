export * from './app-logger.service';
export * from './logger.module';
