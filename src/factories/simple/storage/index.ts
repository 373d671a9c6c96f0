export { Pvc } from './persistent-volume-claim.js';
