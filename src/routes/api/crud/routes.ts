/**
 * CRUD API Route Barrel Export
 *
 * - Model operations: ModelGet, ModelPost
 * - Schema operations: SchemaGet, ActionsGet
 * - Record operations: RecordGet, RecordPut (with ID parameter)
 * - Relation operations: RelationGet
 */

// Model operations (no ID parameter)
export { default as ModelGet } from '@src/routes/api/crud/:model/GET.js';
export { default as ModelPost } from '@src/routes/api/crud/:model/POST.js';

// Schema operations
export { default as SchemaGet } from '@src/routes/api/crud/:model/schema/GET.js';
export { default as ActionsGet } from '@src/routes/api/crud/:model/actions/:scope/GET.js';

// Record operations (with ID parameter)
export { default as RecordGet } from '@src/routes/api/crud/:model/:id/GET.js';
export { default as RecordPut } from '@src/routes/api/crud/:model/:id/PUT.js';

// Relation operations
export { default as RelationGet } from '@src/routes/api/crud/:model/:id/:relation/GET.js';
