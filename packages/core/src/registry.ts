/**
 * Overload Registry - groups overloads by key and dispatches calls
 *
 * Every registration appends a candidate to the dispatch group named by its
 * key, creating the group (and its dispatch handle) on first use. A call to
 * the handle tries candidates in registration order and invokes the first
 * whose signature accepts the arguments.
 *
 * @example
 * ```typescript
 * const registry = createOverloadRegistry();
 *
 * const describe = registry
 *   .register(declareSignature((n: number) => `number ${n}`, { params: ["n"], types: { n: Number } }))
 *   .add(declareSignature((s: string) => `string ${s}`, { params: ["s"], types: { s: String } }));
 *
 * describe(1);   // "number 1"
 * describe("x"); // "string x"
 * ```
 */

import { config as sharedConfig, type Config } from "./config.js";
import { createTypeNamespace, type TypeNamespace } from "./constraints.js";
import {
  FinalizeWithoutGroupError,
  isRetryableError,
  MalformedOverloadTargetError,
  NoMatchingOverloadError,
} from "./errors.js";
import { explicitIntrospector, type Introspector } from "./introspector.js";
import { splitArguments, toArgumentList } from "./keywords.js";
import { createLogger, type Logger, type LogWriter } from "./logger.js";
import { Signature } from "./signature.js";
import {
  targetName,
  unwrapTarget,
  type Implementation,
  type OverloadTarget,
  type UnwrappedTarget,
} from "./targets.js";
import type {
  AnyFunction,
  CallArguments,
  CandidateOutcome,
  OverloadKey,
  SignatureDescriptor,
  TypeAnnotation,
} from "./types.js";

// ============================================================================
// Public Types
// ============================================================================

/** One registered overload. */
export interface Candidate {
  readonly signature: Signature;
  readonly implementation: Implementation;
  /** The signature rendered for logs, e.g. `area(w: number, h: number)` */
  readonly label: string;
}

/** The ordered overloads sharing one key. */
export interface DispatchGroup {
  readonly key: OverloadKey;
  readonly candidates: readonly Candidate[];
  readonly handle: OverloadedFunction;
}

export interface RegisterOptions {
  /** Group to add to (default: the registry's `keyOf`, else a new group) */
  key?: OverloadKey;
  /** Overrides merged over the introspected descriptor */
  signature?: Partial<SignatureDescriptor>;
  /** Per-parameter annotations, merged over `signature.types` */
  types?: Readonly<Record<string, TypeAnnotation>>;
}

export interface FinalizeOptions {
  key?: OverloadKey;
  /** Documentation for the handle (default: the wrapper's descriptor doc) */
  doc?: string;
}

/**
 * The dispatch handle of a group: call it like the function it overloads.
 * A trailing `kw({...})` argument carries keyword arguments.
 */
export interface OverloadedFunction {
  (...argv: unknown[]): unknown;
  readonly key: OverloadKey;
  /** Documentation of the canonical overload */
  readonly doc: string | undefined;
  /** Register another overload in this group. */
  add(target: OverloadTarget, options?: Omit<RegisterOptions, "key">): OverloadedFunction;
  /** Dispatch with explicit positional and keyword arguments. */
  invoke(args: readonly unknown[], kwargs?: Readonly<Record<string, unknown>>): unknown;
  /** Signatures in registration order. */
  signatures(): readonly Signature[];
}

/** Derives a group key from a target; `undefined` means "new group". */
export type KeyStrategy = (target: OverloadTarget) => OverloadKey | undefined;

export interface OverloadRegistryOptions {
  /** Source of parameter metadata (default: hand-declared descriptors only) */
  introspector?: Introspector;
  /** Namespace for string type references */
  types?: TypeNamespace;
  config?: Config;
  /** Log writer (default: console) */
  writer?: LogWriter;
  keyOf?: KeyStrategy;
}

// ============================================================================
// Key Strategies
// ============================================================================

const methodKeys = new WeakMap<object, Map<string, symbol>>();

/**
 * A stable key for a member of `owner`. Members of the same name on
 * different owners get different keys.
 */
export function methodKey(owner: object, member: string): symbol {
  let keys = methodKeys.get(owner);
  if (!keys) {
    keys = new Map();
    methodKeys.set(owner, keys);
  }
  let key = keys.get(member);
  if (!key) {
    const ownerName = typeof owner === "function" ? owner.name : owner.constructor?.name;
    key = Symbol(`${ownerName || "<anonymous>"}.${member}`);
    keys.set(member, key);
  }
  return key;
}

/** Group targets by their function name. Anonymous targets get new groups. */
export const keyByName: KeyStrategy = (target) => {
  const name = targetName(target);
  return name === "<anonymous>" ? undefined : name;
};

// ============================================================================
// Dispatch Groups
// ============================================================================

/** A handle whose metadata its group can re-tag. */
interface Handle extends OverloadedFunction {
  doc: string | undefined;
}

function createHandle(
  group: Group,
  registry: OverloadRegistry,
  name: string,
  doc: string | undefined,
): Handle {
  const dispatch = function (this: unknown, ...argv: unknown[]): unknown {
    return registry.dispatch(group, this, splitArguments(argv));
  };
  Object.defineProperty(dispatch, "name", { value: name, configurable: true });

  return Object.assign(dispatch, {
    key: group.key,
    doc,
    add(target: OverloadTarget, options: Omit<RegisterOptions, "key"> = {}): OverloadedFunction {
      return registry.register(target, { ...options, key: group.key });
    },
    invoke(args: readonly unknown[], kwargs: Readonly<Record<string, unknown>> = {}): unknown {
      return registry.dispatch(group, undefined, { args, kwargs });
    },
    signatures(): readonly Signature[] {
      return group.candidates.map((candidate) => candidate.signature);
    },
  });
}

class Group implements DispatchGroup {
  readonly candidates: Candidate[] = [];
  readonly handle: Handle;

  constructor(
    readonly key: OverloadKey,
    registry: OverloadRegistry,
    name: string,
    doc: string | undefined,
  ) {
    this.handle = createHandle(this, registry, name, doc);
  }

  /** Give the handle new descriptive metadata. */
  retag(name: string, doc: string | undefined): void {
    Object.defineProperty(this.handle, "name", { value: name, configurable: true });
    this.handle.doc = doc;
  }
}

// ============================================================================
// Registry
// ============================================================================

export class OverloadRegistry {
  private readonly groups = new Map<OverloadKey, Group>();
  private readonly introspector: Introspector;
  private readonly types: TypeNamespace;
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly keyOf: KeyStrategy | undefined;

  constructor(options: OverloadRegistryOptions = {}) {
    this.introspector = options.introspector ?? explicitIntrospector;
    this.types = options.types ?? createTypeNamespace();
    this.config = options.config ?? sharedConfig;
    this.logger = createLogger("dispatch", { config: this.config, writer: options.writer });
    this.keyOf = options.keyOf;
  }

  /**
   * Register an overload and return the handle of its group.
   *
   * @throws MalformedOverloadTargetError when the target's shape is unknown
   * @throws InvalidSignatureError when its descriptor is inconsistent
   */
  register(target: OverloadTarget, options: RegisterOptions = {}): OverloadedFunction {
    const unwrapped = unwrapTarget(target);
    const descriptor = this.describe(unwrapped, options);
    const signature = Signature.fromDescriptor(descriptor, {
      skipFirstParameter: unwrapped.skipFirstParameter,
      types: this.types,
      name: unwrapped.name,
    });

    const key = options.key ?? this.keyOf?.(target) ?? Symbol(unwrapped.name);
    let group = this.groups.get(key);
    if (!group) {
      group = new Group(key, this, unwrapped.name, descriptor.doc);
      this.groups.set(key, group);
      this.logger.debug(`created group ${String(key)}`);
    }

    const label = signature.toString();
    if (group.candidates.some((candidate) => candidate.label === label)) {
      this.logger.warn(
        `${label} is already registered under ${String(key)}; the later overload ` +
          `is only reached when the earlier one fails`,
      );
    }

    group.candidates.push({ signature, implementation: unwrapped.implementation, label });
    this.logger.debug(`registered ${label} as candidate #${group.candidates.length}`);
    return group.handle;
  }

  /**
   * Re-expose an existing group under the name and doc of `wrapper`, a
   * declaration that carries no implementation of its own.
   *
   * @throws FinalizeWithoutGroupError when nothing is registered under the key
   */
  finalize(wrapper: AnyFunction, options: FinalizeOptions = {}): OverloadedFunction {
    const name = targetName(wrapper);
    const key = options.key ?? this.keyOf?.(wrapper);
    const group = key === undefined ? undefined : this.groups.get(key);
    if (!group) {
      throw new FinalizeWithoutGroupError(name, key);
    }

    group.retag(name, options.doc ?? this.introspector.describe(wrapper)?.doc);
    return group.handle;
  }

  /** Dispatch a call to the group registered under `key`. */
  invoke(
    key: OverloadKey,
    args: readonly unknown[],
    kwargs: Readonly<Record<string, unknown>> = {},
  ): unknown {
    const group = this.groups.get(key);
    if (!group) {
      throw new NoMatchingOverloadError(String(key), key, args.length, Object.keys(kwargs));
    }
    return this.dispatch(group, undefined, { args, kwargs });
  }

  has(key: OverloadKey): boolean {
    return this.groups.has(key);
  }

  group(key: OverloadKey): DispatchGroup | undefined {
    return this.groups.get(key);
  }

  /** @internal Called by dispatch handles. */
  dispatch(group: DispatchGroup, receiver: unknown, call: CallArguments): unknown {
    const retry = this.config.flag("dispatch.retry", true);

    // Overloads registered from inside an implementation join later calls
    const candidates = [...group.candidates];
    for (const [index, candidate] of candidates.entries()) {
      const outcome = this.attempt(candidate, receiver, call, retry);
      switch (outcome.kind) {
        case "matched":
          this.logger.trace(`${String(group.key)}: #${index + 1} ${candidate.label} matched`);
          return outcome.value;
        case "rejected":
          this.logger.trace(`${String(group.key)}: #${index + 1} ${candidate.label} rejected`);
          break;
        case "failed":
          this.logger.trace(
            `${String(group.key)}: #${index + 1} ${candidate.label} failed: ${describeError(outcome.error)}`,
          );
          break;
      }
    }

    throw new NoMatchingOverloadError(
      group.handle.name,
      group.key,
      call.args.length,
      Object.keys(call.kwargs),
    );
  }

  private attempt(
    candidate: Candidate,
    receiver: unknown,
    call: CallArguments,
    retry: boolean,
  ): CandidateOutcome {
    const bound = candidate.signature.match(call.args, call.kwargs);
    if (!bound) return { kind: "rejected" };

    try {
      return { kind: "matched", value: candidate.implementation(receiver, toArgumentList(bound)) };
    } catch (error) {
      if (retry && isRetryableError(error)) {
        return { kind: "failed", error };
      }
      throw error;
    }
  }

  private describe(unwrapped: UnwrappedTarget, options: RegisterOptions): SignatureDescriptor {
    const described = this.introspector.describe(unwrapped.definition);
    const overrides = options.signature ?? {};
    const params = overrides.params ?? described?.params;

    if (!params) {
      throw unwrapped.isClass
        ? new MalformedOverloadTargetError(
            unwrapped.name,
            "no-constructor",
            `Overloaded class '${unwrapped.name}' requires a constructor implementation`,
          )
        : new MalformedOverloadTargetError(
            unwrapped.name,
            "undescribed",
            `Cannot determine the parameters of '${unwrapped.name}'; declare its signature`,
          );
    }

    const types = { ...described?.types, ...overrides.types, ...options.types };
    return {
      ...described,
      ...overrides,
      params,
      ...(Object.keys(types).length > 0 ? { types } : {}),
    };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/** Create a registry. */
export function createOverloadRegistry(options: OverloadRegistryOptions = {}): OverloadRegistry {
  return new OverloadRegistry(options);
}

