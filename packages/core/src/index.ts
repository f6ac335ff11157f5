export * from './types';
export * from './errors';
export * from './fingerprint/fingerprint';
export * from './fingerprint/differ';
export * from './baseline/codecs';
export * from './baseline/artifact';
export * from './baseline/store';
export * from './progress/tracker';
export * from './resource/guard';
export * from './session';
export * from './detector/extraction';
export * from './detector/change-detector';
export * from './detector/baseline-builder';
export * from './scheduler/polling-scheduler';
export * from './dispatcher/file-filter';
export * from './dispatcher/event-dispatcher';
export * from './utils/env-manager';
