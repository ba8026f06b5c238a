export * from './bookvault.client';
export * from './session-storage';
export * from './session.store';
export * from './types';
