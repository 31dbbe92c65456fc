export { wires } from './wires.js';
export { dependencies } from './dependencies.js';
export { meta } from './meta.js';
