// src/extraction/service.ts
// Runs extraction for a stored document and persists the resulting slots.

import { DocumentInUseError, NotFoundError } from '../errors';
import { createLogger } from '../observability/logger';
import { recordSlotsExtracted } from '../observability/metrics';
import type { DocumentStore } from '../store/documents';
import type { ConversationStore } from '../store/sessions';
import { KeyedLock } from '../utils/keyedLock';
import type { TypeClassifier } from './classifier';
import { SlotRegistry } from './registry';
import type { ScanOptions } from './scanner';
import type { Slot } from './types';

const log = createLogger('extraction/service');

export interface ExtractionOptions extends ScanOptions {
  contextChars?: number;
  dedupeLabels?: boolean;
}

export interface ExtractionServiceDeps {
  documents: DocumentStore;
  sessions: ConversationStore;
  classifier: TypeClassifier;
  /** Shared with the conversation service so extraction never races a turn */
  documentLocks?: KeyedLock;
  options?: ExtractionOptions;
}

export interface ExtractionService {
  /**
   * (Re-)extract slots; any earlier slot values are discarded.
   * Refused with DocumentInUseError while a session on the document is open.
   */
  process(documentId: string): Promise<Slot[]>;
}

export function createExtractionService(deps: ExtractionServiceDeps): ExtractionService {
  const locks = deps.documentLocks ?? new KeyedLock();
  const options = deps.options ?? {};

  return {
    async process(documentId: string): Promise<Slot[]> {
      return locks.run(documentId, async () => {
        const doc = await deps.documents.get(documentId);
        if (!doc) throw new NotFoundError('document', documentId);

        const open = await deps.sessions.countOpen(documentId);
        if (open > 0) throw new DocumentInUseError(documentId, open);

        const started = Date.now();
        const registry = await SlotRegistry.extract(doc.text, deps.classifier, options);
        const slots = registry.list();

        await deps.documents.replaceSlots(documentId, slots);
        await deps.documents.setStatus(documentId, 'processed');

        recordSlotsExtracted(slots.map((s) => s.inferredType));
        log.info(
          {
            documentId,
            slots: slots.length,
            aliases: slots.filter((s) => s.aliasOf !== null).length,
            durationMs: Date.now() - started,
          },
          'document processed'
        );
        return slots;
      });
    },
  };
}
