export * from './login-user';
export * from './security-framework.service';
export * from './require-permissions.decorator';
export * from './permit-all.decorator';
export * from './permission.guard';
export * from './token-authentication.filter';
export * from './security.module';
