export { inherit } from './inheritor.js';
