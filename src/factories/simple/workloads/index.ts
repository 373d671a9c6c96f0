export { Deployment } from './deployment.js';
export { Job } from './job.js';
export { Pod } from './pod.js';
export { StatefulSet } from './stateful-set.js';
