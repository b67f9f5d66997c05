export * from "./build";
export {
  InvalidConfigurationError,
  StructuralIntegrityError,
} from "./errors";
export * from "./flat_record";
export * from "./flatten";
export { DEFAULT_MAX_ELEMS } from "./internal/misc";
export * from "./nodes";
export * from "./partition_tree";
export * from "./rebuild";
export * from "./render";
export * from "./saved_tree";
export * from "./traverse";
