export { CollaboratorError, ResolverError, wrapError } from './collaborator-error.js';
export type { ErrorCode, CollaboratorErrorDetails } from './collaborator-error.js';
