export * from './remote-fallback';
export * from './fire-and-forget';
