/**
 * Workflows - operations that report results instead of throwing.
 */

export { checkoutRefWorkflow } from './checkout.js';

export type { WorkflowResult, CheckoutRefOptions, CheckoutRefResult } from './types.js';
