import { fileURLToPath } from 'node:url';

/** Sample ontology shipped with the package, copied by `authrag init`. */
export const BUNDLED_ONTOLOGY_PATH = fileURLToPath(new URL('../data/ontology.json', import.meta.url));

/** Sample authority table with fictional authors. */
export const BUNDLED_AUTHORITIES_PATH = fileURLToPath(new URL('../data/authorities.json', import.meta.url));
