// src/assembly/service.ts
// Assembles a stored document and marks it completed.

import { IncompleteDocumentError, NotFoundError } from '../errors';
import { createLogger } from '../observability/logger';
import { recordAssembly } from '../observability/metrics';
import type { DocumentRecord, DocumentStore } from '../store/documents';
import { assemble, DEFAULT_POLICY, type AssemblyPolicy } from './assembler';

const log = createLogger('assembly/service');

export interface AssembledDocument {
  document: DocumentRecord;
  text: string;
}

export interface AssemblyService {
  assembleDocument(documentId: string): Promise<AssembledDocument>;
}

export function createAssemblyService(
  documents: DocumentStore,
  policy: AssemblyPolicy = DEFAULT_POLICY
): AssemblyService {
  return {
    async assembleDocument(documentId: string): Promise<AssembledDocument> {
      const doc = await documents.get(documentId);
      if (!doc) throw new NotFoundError('document', documentId);

      const slots = await documents.getSlots(documentId);
      let text: string;
      try {
        text = assemble({ text: doc.text, slots }, policy);
      } catch (err) {
        if (err instanceof IncompleteDocumentError) {
          recordAssembly('incomplete');
          log.info(
            { documentId, pending: err.pendingSlotIds.length, skipped: err.skippedSlotIds.length },
            'assembly refused'
          );
        }
        throw err;
      }

      recordAssembly('success');
      if (doc.status !== 'completed') {
        await documents.setStatus(documentId, 'completed');
      }
      return { document: { ...doc, status: 'completed' }, text };
    },
  };
}
