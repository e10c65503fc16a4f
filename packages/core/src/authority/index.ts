export {
  InMemoryAuthorityStore,
  authorityDocumentSchema,
  buildAuthorityStore,
  cleanAuthorName,
  loadAuthorityFile,
} from './authority-store.js';
export type { AuthorityDocument, AuthorityEntry } from './authority-store.js';
