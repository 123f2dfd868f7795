/**
 * Extraction Prompt Templates
 */

export type { ExtractionTemplate } from './types';
export { AUM_TEMPLATE } from './aum.template';
