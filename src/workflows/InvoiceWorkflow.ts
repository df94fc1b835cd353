import { defineResolutionConfig } from '../config/resolution.js';
import type { WorkflowStep } from '../orchestration/WorkflowEngine.js';
import type { ResolutionEngine } from '../services/resolution/ResolutionEngine.js';
import { ActionResults } from '../services/resolution/results.js';
import type { DataRecord, JsonValue } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { BaseWorkflow } from './BaseWorkflow.js';
import { resolveBatchStep, resolveEntityStep } from './steps.js';

export const CUSTOMER_RESOLUTION = defineResolutionConfig({
  model: 'customer',
  searchFields: ['name', 'email'],
  identifierField: 'name',
  checkDuplicates: true,
  subflow: 'create_customer',
  includeFields: ['email'],
  displayFields: ['name', 'email'],
});

export const LINE_ITEM_RESOLUTION = defineResolutionConfig({
  model: 'product',
  searchFields: ['name', 'sku'],
  identifierField: 'name',
  subflow: 'create_product',
  includeFields: ['price'],
  requiredItemFields: ['price'],
  baseFields: ['id', 'name'],
  friendlyName: 'product',
  aliasKeys: ['products'],
});

function lineTotal(item: DataRecord): number {
  const price: JsonValue | undefined = item.price;
  const quantity: JsonValue | undefined = item.quantity;
  return (typeof price === 'number' ? price : 0) * (typeof quantity === 'number' ? quantity : 1);
}

/**
 * Draft an invoice: who it is for, then what is on it. Unknown customers and
 * products are created along the way through their own workflows.
 */
export class InvoiceWorkflow extends BaseWorkflow {
  readonly id = 'invoice';

  constructor(private readonly engine: ResolutionEngine) {
    super();
  }

  getEntityFields(): string[] {
    return ['customer_id', 'items'];
  }

  protected initializeSteps(): WorkflowStep[] {
    return [
      resolveEntityStep(this.engine, {
        name: 'customer',
        field: 'customer_id',
        config: CUSTOMER_RESOLUTION,
        input: 'customer',
        prompt: 'Which customer is this invoice for?',
      }),
      resolveBatchStep(this.engine, {
        name: 'line_items',
        field: 'items',
        config: LINE_ITEM_RESOLUTION,
        input: 'line_items',
        prompt: 'Which products should the invoice include?',
      }),
      {
        name: 'summary',
        execute: async (context) => {
          const customerId = context.getCollected('customer_id');
          const rawItems = context.getCollected('items');
          const items = Array.isArray(rawItems)
            ? rawItems.filter((item): item is DataRecord => typeof item === 'object' && item !== null && !Array.isArray(item))
            : [];

          const total = items.reduce((sum, item) => sum + lineTotal(item), 0);
          logger.info('🧾 [InvoiceWorkflow] Draft ready', { customerId, lines: items.length, total });

          return ActionResults.success(
            `Invoice draft for customer #${String(customerId)}: ${items.length} line items, total ${total.toFixed(2)}`,
            { customer_id: customerId ?? null, items, total }
          );
        },
      },
    ];
  }
}
