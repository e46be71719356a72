export * from './telegram.module';
export * from './telegram.service';
export * from './dashboard.formatter';
export * from './formatting.utils';
