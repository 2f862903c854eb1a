/**
 * Timezone provider adapter and civil-calendar utilities.
 */

export * from './calendar.js';
export * from './format.js';
export * from './provider.js';
