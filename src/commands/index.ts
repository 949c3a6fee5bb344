export { registerVersion } from './version.js';
export { registerSync } from './sync.js';
export { registerStatus } from './status.js';
export { registerConfig } from './config.js';
export { registerRequirements } from './requirements.js';
