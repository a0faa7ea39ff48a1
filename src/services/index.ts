// src/services/index.ts
export * from './MiseTaskService.js';
export * from './MiseTaskServiceTypes.js';
export * from './ProjectStructureService.js';
export * from './TaskExtractionService.js';
export * from './DependencyGraphService.js';
export * from './TaskChainService.js';
export * from './ArchitectureValidationService.js';
export * from './RedundancyDetectionService.js';
export * from './TaskPlacementService.js';
export * from './TaskPersistenceService.js';
export * from './TaskRecommendationService.js';
export * from './TaskUtilsService.js';
