export {
  createExpressAuth,
  identityErrorHandler,
  type ExpressAuth,
  type ExpressAuthOptions,
} from './express.js';

export {
  createNodeAuth,
  type NodeAuth,
  type NodeAuthOptions,
  type NodeHandler,
} from './node-http.js';
