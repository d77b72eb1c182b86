import type { AttributeDescriptor, Diagnostic } from '../report/types.js';

/**
 * What resolving one attribute came to.
 */
export type ResolveOutcome =
  | {
      kind: 'failed';
      descriptor: AttributeDescriptor;
      /** Package set the lookup ran against, for the synthetic message */
      packageSet: string;
    }
  | {
      kind: 'not-found';
      descriptor: AttributeDescriptor;
      packageSet: string;
    }
  | {
      kind: 'resolved';
      descriptor: AttributeDescriptor;
      /** Embedded diagnostics, in evaluation order */
      diagnostics: Diagnostic[];
    };

export interface ResolveResult {
  /** One per distinct requested path, in request order */
  outcomes: ResolveOutcome[];
  descriptors: AttributeDescriptor[];
}
