export { createRepositories } from './repositories.js';
export { createServices } from './services.js';
