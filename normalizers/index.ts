/**
 * Normalizers for turning free-text worksheet cells into structured values
 *
 * - Worker names are folded to a comparable "j.kowalski" key
 * - Day labels become YYYY-MM-DD dates
 * - Hour ranges become zero-padded HH:mm:ss pairs
 */

export * from './utils.js';
export * from './names.js';
export * from './dates.js';
