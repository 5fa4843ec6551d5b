export * from './http-client.factory';
export * from './http.module';
