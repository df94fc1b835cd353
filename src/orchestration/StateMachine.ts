import type { FieldResolutionState } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { ResolutionError } from '../services/resolution/errors.js';

export type ResolutionPhase =
  | 'searching'
  | 'found'
  | 'duplicate_check'
  | 'auto_resolved'
  | 'awaiting_choice'
  | 'resolved'
  | 'creating_new'
  | 'not_found'
  | 'awaiting_create_confirmation'
  | 'creating_via_subflow'
  | 'creating_auto'
  | 'cancelled'
  | 'failed';

const TERMINAL_PHASES: ReadonlySet<ResolutionPhase> = new Set([
  'found',
  'auto_resolved',
  'resolved',
  'cancelled',
  'failed',
]);

/**
 * Allowed transitions of the single-entity resolution machine. One instance per
 * resolution call, entered at the phase the persisted field state implies.
 */
export class StateMachine {
  private currentPhase: ResolutionPhase;
  private readonly history: ResolutionPhase[];
  private readonly transitions = new Map<ResolutionPhase, ResolutionPhase[]>();

  constructor(
    initialPhase: ResolutionPhase = 'searching',
    private readonly label = 'resolution'
  ) {
    this.currentPhase = initialPhase;
    this.history = [initialPhase];
    this.initializeTransitions();
  }

  /**
   * Phase a call resumes at, given what the previous turn left behind
   */
  static entryPhase(state: FieldResolutionState): ResolutionPhase {
    switch (state.kind) {
      case 'awaiting_duplicate_choice':
        return 'awaiting_choice';
      case 'awaiting_create_confirm':
        return 'awaiting_create_confirmation';
      case 'creating_via_subflow':
        return 'creating_via_subflow';
      default:
        return 'searching';
    }
  }

  private initializeTransitions(): void {
    this.addTransitions('searching', ['found', 'duplicate_check', 'not_found', 'failed']);
    this.addTransitions('duplicate_check', ['auto_resolved', 'awaiting_choice', 'not_found']);
    // Re-prompting on an unclear reply stays in awaiting_choice
    this.addTransitions('awaiting_choice', ['resolved', 'creating_new', 'awaiting_choice']);
    // Without a confirmation step creation starts straight from not_found
    this.addTransitions('not_found', ['awaiting_create_confirmation', 'creating_via_subflow', 'creating_auto', 'failed']);
    // Choosing "new" over a duplicate is already a confirmation
    this.addTransitions('creating_new', ['creating_via_subflow', 'creating_auto', 'failed']);
    this.addTransitions('awaiting_create_confirmation', [
      'awaiting_create_confirmation',
      'creating_via_subflow',
      'creating_auto',
      'cancelled',
      'failed',
    ]);
    this.addTransitions('creating_via_subflow', ['creating_via_subflow', 'resolved', 'failed']);
    this.addTransitions('creating_auto', ['resolved', 'failed']);
  }

  private addTransitions(from: ResolutionPhase, to: ResolutionPhase[]): void {
    this.transitions.set(from, [...(this.transitions.get(from) ?? []), ...to]);
  }

  canTransition(to: ResolutionPhase): boolean {
    return (this.transitions.get(this.currentPhase) ?? []).includes(to);
  }

  /**
   * Move to `to`. An illegal move is a bug in the resolver and throws.
   */
  transition(to: ResolutionPhase): void {
    if (!this.canTransition(to)) {
      throw new ResolutionError(`Invalid ${this.label} transition ${this.currentPhase} -> ${to}`, 'unexpected');
    }
    logger.debug(`[StateMachine] ${this.label}: ${this.currentPhase} -> ${to}`);
    this.currentPhase = to;
    this.history.push(to);
  }

  getCurrentPhase(): ResolutionPhase {
    return this.currentPhase;
  }

  getAllowedTransitions(): ResolutionPhase[] {
    return [...(this.transitions.get(this.currentPhase) ?? [])];
  }

  isTerminalState(): boolean {
    return TERMINAL_PHASES.has(this.currentPhase);
  }

  getStateHistory(): ResolutionPhase[] {
    return [...this.history];
  }
}
