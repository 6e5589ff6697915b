export * from './logger/Logger';
export * from './utils/time/Clock';
export * from './coordination/KeyedMutex';
