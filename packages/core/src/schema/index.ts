export { tasks } from './tasks.js';
export { storeMeta } from './store-meta.js';
