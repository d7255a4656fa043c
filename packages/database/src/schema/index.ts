// Export enums first (other schemas depend on them)
export * from './enums';

export * from './cards';
export * from './payments';
export * from './obligations';
export * from './exchange-rates';
export * from './admin';
