import { createDiagnostic } from '../report/diagnostic.js';
import { BuiltinDiagnostics, type AttributeDescriptor, type Diagnostic, type DiagnosticBundle } from '../report/types.js';

export function noBuildOutputDiagnostic(attr: string): Diagnostic {
  return createDiagnostic({
    name: BuiltinDiagnostics.NO_BUILD_OUTPUT,
    message: `‘${attr}’ has not yet been built. Checks that need the build output will not be run.`,
    severity: 'notice',
    hasDocumentationLink: false,
  });
}

/**
 * Built-in notices: one `no-build-output` for every attribute without an
 * artifact on disk. Every descriptor gets a key, empty when nothing applies.
 */
export function buildNoticeBundle(
  descriptors: readonly AttributeDescriptor[],
  excluded: ReadonlySet<string> = new Set()
): DiagnosticBundle {
  const skip = excluded.has(BuiltinDiagnostics.NO_BUILD_OUTPUT);
  const bundle: DiagnosticBundle = new Map();
  for (const descriptor of descriptors) {
    bundle.set(
      descriptor.name,
      !skip && descriptor.artifactPath === undefined ? [noBuildOutputDiagnostic(descriptor.name)] : []
    );
  }
  return bundle;
}
