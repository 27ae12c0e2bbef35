/**
 * @polydispatch/core — Runtime multiple dispatch on argument shape and type.
 *
 * Register several implementations under one key and call the group's
 * handle: the first overload whose signature accepts the arguments runs.
 *
 * @packageDocumentation
 */

export type {
  AnyFunction,
  ClassTarget,
  TypeConstructor,
  OverloadKey,
  RuntimeType,
  TypeRef,
  TypeAnnotation,
  TypeConstraint,
  ParamKind,
  ParameterSpec,
  SignatureDescriptor,
  CallArguments,
  BoundCall,
  CandidateOutcome,
} from "./types.js";

export {
  NoMatchingOverloadError,
  MalformedOverloadTargetError,
  FinalizeWithoutGroupError,
  InvalidSignatureError,
  UnresolvedTypeError,
  CandidateRejectedError,
  isRetryableError,
} from "./errors.js";
export type { MalformedTargetReason, InvalidSignatureReason } from "./errors.js";

export { config, createConfig, loadConfigFromEnv } from "./config.js";
export type { Config, PolydispatchConfig, DispatchConfig, IntrospectConfig } from "./config.js";

export { createLogger } from "./logger.js";
export type { Logger, LoggerOptions, LogWriter } from "./logger.js";

export {
  defineType,
  Int,
  typeOfConstructor,
  TypeNamespace,
  createTypeNamespace,
  resolveAnnotation,
  satisfies,
  formatConstraint,
} from "./constraints.js";

export { Keywords, kw, splitArguments, toArgumentList } from "./keywords.js";

export { Signature } from "./signature.js";
export type { SignatureOptions } from "./signature.js";

export {
  declareSignature,
  getDeclaredSignature,
  explicitIntrospector,
  chainIntrospectors,
} from "./introspector.js";
export type { Definition, Introspector } from "./introspector.js";

export { classMethod, staticMethod, isClass, targetName, unwrapTarget } from "./targets.js";
export type {
  Implementation,
  ClassMethodTarget,
  StaticMethodTarget,
  MethodTarget,
  OverloadTarget,
  UnwrappedTarget,
} from "./targets.js";

export {
  OverloadRegistry,
  createOverloadRegistry,
  methodKey,
  keyByName,
} from "./registry.js";
export type {
  Candidate,
  DispatchGroup,
  RegisterOptions,
  FinalizeOptions,
  OverloadedFunction,
  KeyStrategy,
  OverloadRegistryOptions,
} from "./registry.js";
