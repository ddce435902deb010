export * from './endpointKey';
export * from './queryParser';
export * from './failureClassifier';
export * from './retry';
export * from './session';
export * from './connectionPool';
export * from './treeWalker';
export * from './globCandidates';
export * from './storageObject';
export * from './storageProvider';
export * from './configManager';
