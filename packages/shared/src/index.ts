export * from './calendar-date';
export * from './currency';
export * from './date-series';
export * from './schemas';
export * from './types';
