/**
 * MongoDB services module.
 *
 * The JSON document store and the per-operation deadline it runs under.
 */

export {
  JsonDocumentStore,
  type JsonDocumentStoreOptions,
  type OperationOptions,
  type StoreOperation,
} from './store.js';
export { Deadline, withDeadline } from './deadline.js';
