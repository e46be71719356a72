export * from './core.module';
export * from './env.schema';
export * from './env.utils';
export * from './log-levels';
