export * from './api-error-log.api';
export * from './api-access-log.api';
export * from './dto/api-error-log-create.dto';
export * from './dto/api-access-log-create.dto';
