import type { HumanInTheLoop } from '../orchestration/HumanInTheLoop.js';
import type { WorkflowStep } from '../orchestration/WorkflowEngine.js';
import type { DataExtractor, FieldSpec } from '../services/resolution/DataExtractor.js';
import type { EntityStoreRegistry } from '../services/store/EntityStore.js';
import { BaseWorkflow } from './BaseWorkflow.js';
import { collectFieldsStep, createEntityStep } from './steps.js';

const PRODUCT_FIELDS: FieldSpec[] = [
  { name: 'name', type: 'text', label: 'name' },
  { name: 'price', type: 'number', label: 'price' },
  { name: 'sku', type: 'text', label: 'SKU', required: false },
];

/**
 * Creates a product. Usually started as a subflow when an invoice line names an unknown product.
 */
export class CreateProductWorkflow extends BaseWorkflow {
  readonly id = 'create_product';
  readonly entityName = 'product';
  readonly identifierField = 'name';
  readonly inputFieldMap = { unit_price: 'price' };

  constructor(
    private readonly extractor: DataExtractor,
    private readonly prompts: HumanInTheLoop,
    private readonly stores: EntityStoreRegistry
  ) {
    super();
  }

  getEntityFields(): string[] {
    return PRODUCT_FIELDS.map((field) => field.name);
  }

  protected initializeSteps(): WorkflowStep[] {
    return [
      collectFieldsStep(this.extractor, this.prompts, {
        name: 'collect_details',
        entity: 'product',
        fields: PRODUCT_FIELDS,
      }),
      createEntityStep(this.stores, {
        name: 'save',
        entity: 'product',
        model: 'product',
        fields: this.getEntityFields(),
      }),
    ];
  }
}
