import type { Candidate, CandidateSummary, DataRecord, ResolutionConfig } from '../types/index.js';
import { TextUtils } from '../utils/text.js';
import type { FieldSpec } from '../services/resolution/DataExtractor.js';
import { FriendlyNames, type FriendlyName } from '../services/resolution/FriendlyNames.js';

export interface MissingItemLine {
  name: string;
  quantity: number;
}

/**
 * Builds every user-facing question the resolution engine asks.
 */
export class HumanInTheLoop {
  /**
   * Label shown for a candidate: display fields when configured, else the first search field
   */
  static candidateLabel(candidate: Pick<Candidate, 'id' | 'fields'>, config: ResolutionConfig): string {
    const fields = config.displayFields.length > 0 ? config.displayFields : [config.searchFields[0]];
    const parts = fields
      .map((field) => TextUtils.asText(candidate.fields[field]))
      .filter((part): part is string => part !== null);
    return parts.length > 0 ? parts.join(' - ') : `#${candidate.id}`;
  }

  static summarize(candidates: Candidate[], config: ResolutionConfig): CandidateSummary[] {
    return candidates.map((candidate) => ({
      id: candidate.id,
      label: HumanInTheLoop.candidateLabel(candidate, config),
      score: candidate.similarityScore,
    }));
  }

  buildDuplicateChoiceMessage(name: FriendlyName, candidates: Candidate[], config: ResolutionConfig): string {
    const entity = name.singular;

    if (candidates.length === 1) {
      const [candidate] = candidates;
      const lines = [
        `Found existing ${FriendlyNames.capitalize(entity)}: **${HumanInTheLoop.candidateLabel(candidate, config)}** (Match: ${candidate.similarityScore}%)`,
        '',
        'Would you like to:',
        `1. Use this ${entity} (reply 'use' or 'yes')`,
        `2. Create a new ${entity} (reply 'new' or 'create')`,
      ];
      return lines.join('\n');
    }

    const lines = [`Found ${candidates.length} similar ${name.plural}:`, ''];
    candidates.forEach((candidate, index) => {
      lines.push(`${index + 1}. **${HumanInTheLoop.candidateLabel(candidate, config)}** (Match: ${candidate.similarityScore}%)`);
    });
    lines.push('', `Reply with the number to use one, or 'new' to create a new ${entity}.`);
    return lines.join('\n');
  }

  buildUnclearChoiceMessage(name: FriendlyName, candidates: Candidate[], config: ResolutionConfig): string {
    const hint =
      candidates.length === 1
        ? `'use' to use the existing ${name.singular}, or 'new' to create a new one.`
        : `a number from 1 to ${candidates.length} to use an existing ${name.singular}, or 'new' to create a new one.`;
    return `I didn't understand that. Please reply with ${hint}\n\n${this.buildDuplicateChoiceMessage(name, candidates, config)}`;
  }

  buildCreateConfirmationMessage(name: FriendlyName, identifier: string): string {
    return `${FriendlyNames.capitalize(name.singular)} '${identifier}' doesn't exist. Would you like to create it? (yes/no)`;
  }

  buildBatchCreateConfirmationMessage(name: FriendlyName, items: MissingItemLine[]): string {
    const lines = [`The following ${name.plural} don't exist:`, ''];
    items.forEach((item) => lines.push(`• ${item.name} (qty: ${item.quantity})`));
    lines.push('', 'Would you like to create them? (yes/no)');
    return lines.join('\n');
  }

  buildRetryMessage(name: FriendlyName): string {
    return `Something went wrong while resolving the ${name.singular}. Would you like to try again?`;
  }

  /**
   * Ask for the fields a subflow still needs, naming the entity when it is known
   */
  buildFieldRequestMessage(entity: string, missing: FieldSpec[], collected: DataRecord, identifierField: string): string {
    const identifier = TextUtils.asText(collected[identifierField]);
    const subject = identifier ? `the ${entity} '${identifier}'` : `the new ${entity}`;
    const labels = missing.map((field) => field.label ?? field.name.replace(/_/g, ' '));

    if (labels.length === 1) {
      return `What is the ${labels[0]} of ${subject}?`;
    }
    return `To create ${subject}, I still need: ${TextUtils.formatList(labels)}.`;
  }
}
