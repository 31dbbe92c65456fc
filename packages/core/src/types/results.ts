import type { Status } from './status.js';
import type { Wire, WireId } from './wire.js';

/** Non-fatal notice attached to a successful mutation */
export interface IncompleteDependencyWarning {
  readonly type: 'incomplete_dependency';
  readonly wireId: WireId;
  readonly title: string;
  readonly status: Status;
}

export type Warning = IncompleteDependencyWarning;

export interface MutationResult {
  readonly wire: Wire;
  readonly warnings: readonly Warning[];
}

export type DependencyChange =
  | { readonly type: 'added'; readonly wireId: WireId; readonly dependsOn: WireId }
  | { readonly type: 'unchanged'; readonly wireId: WireId; readonly dependsOn: WireId }
  | { readonly type: 'removed'; readonly wireId: WireId; readonly dependsOn: WireId };

export function hasWarnings(result: MutationResult): boolean {
  return result.warnings.length > 0;
}
