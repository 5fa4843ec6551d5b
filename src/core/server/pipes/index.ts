export * from './request-validation.pipe';
export * from './required-param.pipe';
export * from './parse-int-param.pipe';
