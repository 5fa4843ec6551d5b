export * from './env.validation';
export * from './web.properties';
export * from './web-config.service';
export * from './web-config.module';
