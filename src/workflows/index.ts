/**
 * Workflows Module
 */

export { WorkflowOrchestrator, fetchStep } from './orchestrator.js';
export {
  biweeklyPayroll,
  monthEndClosing,
  quarterlyTaxPrep,
  clientInvoice,
  projectProfitability,
} from './definitions.js';
export type * from './types.js';
