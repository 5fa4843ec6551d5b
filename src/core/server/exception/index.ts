export * from './error-code';
export * from './business.exception';
export * from './business-exception.util';
export * from './execution.exception';
export * from './request.exceptions';
export * from './stack-trace.util';
export * from './api-error-log.builder';
export * from './exception-dispatcher';
