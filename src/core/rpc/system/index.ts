export * from './oauth2-token.api';
export * from './permission.api';
export * from './dto/oauth2-access-token-check.dto';
