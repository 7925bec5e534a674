import {
  AggregateTargetSpec,
  BuildGraph,
  BuildTarget,
  BuildTargetDeclaration,
  ChainState
} from './types';
import { BuildChainError } from './errors';

// Each of these targets spawns a compiler that is itself parallel, so letting
// the build engine run them side by side multiplies the worker count. Threading
// a dependency on the previous target forces them to build one at a time.

export const EMPTY_CHAIN: ChainState = { tail: null, targets: [] };

export function chainTarget(
  state: ChainState,
  declaration: BuildTargetDeclaration
): [BuildTarget, ChainState] {
  if (state.targets.some(target => target.name === declaration.name)) {
    throw new BuildChainError(`Build target '${declaration.name}' is declared twice`);
  }

  const depends = [...(declaration.depends ?? [])];
  if (state.tail) {
    depends.push(state.tail.name);
  }

  const target: BuildTarget = {
    name: declaration.name,
    output: declaration.output,
    command: [...declaration.command],
    depends,
    buildAlwaysStale: true,
    buildByDefault: false
  };

  return [target, { tail: target, targets: [...state.targets, target] }];
}

export function chainTargets(
  declarations: BuildTargetDeclaration[],
  initial: ChainState = EMPTY_CHAIN
): ChainState {
  return declarations.reduce((state, declaration) => chainTarget(state, declaration)[1], initial);
}

export function createAggregateTarget(state: ChainState, spec: AggregateTargetSpec): BuildTarget {
  if (state.targets.some(target => target.name === spec.name)) {
    throw new BuildChainError(`Aggregate target '${spec.name}' clashes with a chained target`);
  }

  return {
    name: spec.name,
    output: spec.output,
    command: [...spec.command],
    depends: state.tail ? [state.tail.name] : [],
    buildAlwaysStale: false,
    buildByDefault: true
  };
}

export function buildChain(
  declarations: BuildTargetDeclaration[],
  aggregate: AggregateTargetSpec
): BuildGraph {
  const state = chainTargets(declarations);
  return { targets: state.targets, aggregate: createAggregateTarget(state, aggregate) };
}

/**
 * Names of every target reachable from `name` through declared dependencies.
 * Dependencies on targets outside `targets` are not followed.
 */
export function transitiveDependencies(name: string, targets: BuildTarget[]): Set<string> {
  const byName = new Map(targets.map(target => [target.name, target]));
  const seen = new Set<string>();
  const pending = [...(byName.get(name)?.depends ?? [])];

  while (pending.length > 0) {
    const next = pending.pop();
    if (next === undefined || seen.has(next) || !byName.has(next)) {
      continue;
    }
    seen.add(next);
    pending.push(...(byName.get(next)?.depends ?? []));
  }

  return seen;
}
