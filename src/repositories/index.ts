// src/repositories/index.ts
export * from './MiseConfigRepository.js';
export * from './TaskFileRepository.js';
