/**
 * Identity Module
 */

export { IdentityType, isValidIdentityType, BasicIdentity, type Identity } from './identity.js';

export {
  runWithIdentity,
  getIdentity,
  requireIdentity,
  runWithCallerService,
  getCallerService
} from './context.js';
