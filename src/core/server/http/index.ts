export * from './http-request';
export * from './cached-body-request';
export * from './request-context';
export * from './web-framework.utils';
export * from './route-method.index';
export * from './request-body.reader';
export * from './form-body-parser';
