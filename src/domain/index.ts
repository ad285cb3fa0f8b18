// Domain layer exports - pure business logic, no external deps

// Cultivation rules and data
export * from './cultivation/types.js';
export * from './cultivation/stages.js';
export * from './cultivation/difficulty.js';
export * from './cultivation/rules.js';

// Character
export * from './character/types.js';

// Game session
export * from './game/types.js';
export * from './game/session.js';
export * from './game/GameState.js';
