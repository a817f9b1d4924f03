/**
 * Incipit Notes
 * Endnotes to a consolidated notes section with incipit labels and
 * short-form note citations.
 */

export * from './services/incipit';
export * from './services/docx';
export { AppError } from './utils/app-error';
export type { StructuralErrorCode } from './utils/app-error';
export { config } from './config';
export type { EmphasisStyle } from './config';
