export { hostBlocker } from './host-blocker.js';
export { headerInjector } from './header-injector.js';
export { requestLogger } from './request-logger.js';
