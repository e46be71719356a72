export * from './models';
export * from './interfaces';
export * from './normalizers';
export * from './market-data.module';
export * from './providers/price-index.provider';
export * from './providers/sentiment.provider';
export * from './providers/derivatives.provider';
export * from './providers/manual-derivatives.source';
export * from './utils/http.util';
