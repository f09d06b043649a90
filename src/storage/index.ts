/**
 * Storage module exports.
 */

export type { Storage } from './storage.js';
export type { JSONStorageConfig } from './json-storage.js';
export { JSONStorage, createJSONStorage } from './json-storage.js';
export type { ClassroomDocumentInput, ClassroomSnapshot } from './json-classroom-store.js';
export {
  CLASSROOM_DOCUMENT_KEY,
  CLASSROOM_DOCUMENT_VERSION,
  classroomDocumentSchema,
  parseClassroomDocument,
  serializeClassroomSnapshot,
  JsonClassroomStore,
  createJsonClassroomStore,
} from './json-classroom-store.js';
