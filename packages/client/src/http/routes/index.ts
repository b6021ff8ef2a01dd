export { handleApiRoutes, STATUS_BY_KIND, type ApiContext } from './api.js';
export { handleFileRoutes } from './files.js';
