export * from './config/environment';
export * from './models/state';
export * from './models/transition';
export * from './services/logger';
export * from './services/navigation/defaultStates';
export * from './services/navigation/navigationEngine';
export * from './services/navigation/navigator';
export * from './services/navigation/report';
export * from './services/navigation/stateGraphRepository';
export * from './services/navigation/telemetry';
export * from './services/vision/clickOrchestrator';
export * from './services/vision/matchProbe';
export * from './services/vision/templateScorer';
export * from './services/vision/templateStore';
export * from './types/errors';
export * from './types/navigation';
export * from './utils/adb';
export * from './utils/clock';
export * from './utils/raster';
