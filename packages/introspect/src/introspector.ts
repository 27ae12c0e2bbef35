import {
  config as sharedConfig,
  createLogger,
  isClass,
  type Config,
  type Definition,
  type Introspector,
  type LogWriter,
  type SignatureDescriptor,
} from "@polydispatch/core";
import { describeSource, type DescribeOptions } from "./describe.js";

export interface SourceIntrospectorOptions extends DescribeOptions {
  config?: Config;
  /** Log writer (default: console) */
  writer?: LogWriter;
}

/**
 * An introspector that reads parameter metadata from the source text of a
 * function or class.
 *
 * Descriptors are cached per definition while `introspect.cache` is on;
 * definitions whose source cannot be described (native or bound functions,
 * classes with no constructor anywhere in their chain) are cached as such
 * too. A class without its own constructor is described by the nearest
 * explicit constructor it inherits.
 */
export function createSourceIntrospector(options: SourceIntrospectorOptions = {}): Introspector {
  const cfg = options.config ?? sharedConfig;
  const logger = createLogger("introspect", { config: cfg, writer: options.writer });
  const cache = new WeakMap<Definition, SignatureDescriptor | null>();
  const describeOptions: DescribeOptions = { keywordPattern: options.keywordPattern };

  const describeOwn = (definition: Definition): SignatureDescriptor | undefined =>
    describeSource(Function.prototype.toString.call(definition), describeOptions);

  const read = (definition: Definition): SignatureDescriptor | undefined => {
    const name = definition.name || "<anonymous>";
    let descriptor = describeOwn(definition);

    // A subclass without its own constructor runs the nearest inherited one
    let source: Definition = definition;
    while (!descriptor && isClass(source)) {
      const parent: unknown = Object.getPrototypeOf(source);
      if (!isClass(parent)) break;
      source = parent;
      const inherited = describeOwn(parent);
      if (inherited) {
        logger.debug(`${name} inherits the constructor of ${parent.name || "<anonymous>"}`);
        descriptor = { ...inherited, name: definition.name || undefined };
      }
    }

    if (descriptor) {
      logger.debug(`described ${name}: ${descriptor.params.length} positional parameter(s)`);
    } else {
      logger.debug(`cannot describe ${name} from its source`);
    }
    return descriptor;
  };

  return {
    describe(definition) {
      if (!cfg.flag("introspect.cache", true)) {
        return read(definition);
      }

      const cached = cache.get(definition);
      if (cached !== undefined) {
        return cached ?? undefined;
      }
      const descriptor = read(definition);
      cache.set(definition, descriptor ?? null);
      return descriptor;
    },
  };
}
