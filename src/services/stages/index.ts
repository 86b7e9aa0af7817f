export * from './sceneBlocks';
export * from './extractionStage';
export * from './storylineStage';
export * from './scenePromptStage';
export * from './narrationStage';
export * from './imageStage';
