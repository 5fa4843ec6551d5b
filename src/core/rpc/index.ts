export * from './rpc.constants';
export * from './degradation';
export * from './infra';
export * from './system';
export * from './rpc.module';
