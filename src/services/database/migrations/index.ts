import type { Migration } from '../../../models/database-schema.js';
import * as createEmbeddings from './001_create_embeddings_table.js';
import * as createDocuments from './002_create_documents_tables.js';

/**
 * All schema migrations, in version order
 */
export const MIGRATIONS: readonly Migration[] = [createEmbeddings, createDocuments];
