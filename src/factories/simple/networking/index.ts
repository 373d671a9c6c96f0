export { Service } from './service.js';
