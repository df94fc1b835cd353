import type { HumanInTheLoop } from '../orchestration/HumanInTheLoop.js';
import type { WorkflowStep } from '../orchestration/WorkflowEngine.js';
import type { DataExtractor, FieldSpec } from '../services/resolution/DataExtractor.js';
import type { EntityStoreRegistry } from '../services/store/EntityStore.js';
import { BaseWorkflow } from './BaseWorkflow.js';
import { collectFieldsStep, createEntityStep } from './steps.js';

const CUSTOMER_FIELDS: FieldSpec[] = [
  { name: 'name', type: 'text', label: 'name' },
  { name: 'email', type: 'email', label: 'email' },
  { name: 'phone', type: 'phone', label: 'phone', required: false },
];

export class CreateCustomerWorkflow extends BaseWorkflow {
  readonly id = 'create_customer';
  readonly entityName = 'customer';
  readonly identifierField = 'name';

  constructor(
    private readonly extractor: DataExtractor,
    private readonly prompts: HumanInTheLoop,
    private readonly stores: EntityStoreRegistry
  ) {
    super();
  }

  getEntityFields(): string[] {
    return CUSTOMER_FIELDS.map((field) => field.name);
  }

  protected initializeSteps(): WorkflowStep[] {
    return [
      collectFieldsStep(this.extractor, this.prompts, {
        name: 'collect_details',
        entity: 'customer',
        fields: CUSTOMER_FIELDS,
      }),
      createEntityStep(this.stores, {
        name: 'save',
        entity: 'customer',
        model: 'customer',
        fields: this.getEntityFields(),
      }),
    ];
  }
}
