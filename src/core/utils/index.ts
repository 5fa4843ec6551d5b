export * from './string.util';
