import type { HumanInTheLoop } from '../orchestration/HumanInTheLoop.js';
import type { WorkflowRegistry } from '../orchestration/WorkflowEngine.js';
import type { DataExtractor } from '../services/resolution/DataExtractor.js';
import type { ResolutionEngine } from '../services/resolution/ResolutionEngine.js';
import type { EntityStoreRegistry } from '../services/store/EntityStore.js';
import { CreateCustomerWorkflow } from './CreateCustomerWorkflow.js';
import { CreateProductWorkflow } from './CreateProductWorkflow.js';
import { InvoiceWorkflow } from './InvoiceWorkflow.js';

export { BaseWorkflow } from './BaseWorkflow.js';
export { CreateCustomerWorkflow } from './CreateCustomerWorkflow.js';
export { CreateProductWorkflow } from './CreateProductWorkflow.js';
export { CUSTOMER_RESOLUTION, InvoiceWorkflow, LINE_ITEM_RESOLUTION } from './InvoiceWorkflow.js';
export * from './steps.js';

interface SampleWorkflowDependencies {
  engine: ResolutionEngine;
  workflows: WorkflowRegistry;
  stores: EntityStoreRegistry;
  extractor: DataExtractor;
  prompts: HumanInTheLoop;
}

/**
 * Register `invoice` and the `create_customer`/`create_product` subflows it starts
 */
export function registerSampleWorkflows(runtime: SampleWorkflowDependencies): WorkflowRegistry {
  const { engine, workflows, stores, extractor, prompts } = runtime;
  return workflows
    .register(new CreateCustomerWorkflow(extractor, prompts, stores))
    .register(new CreateProductWorkflow(extractor, prompts, stores))
    .register(new InvoiceWorkflow(engine));
}
