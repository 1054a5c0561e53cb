// World
export { World, type WorldOptions } from "./world";

// Entities
export {
  create_entity_id,
  format_entity_id,
  get_entity_generation,
  get_entity_index,
  MAX_GENERATION,
  MAX_INDEX,
  type EntityID,
} from "./entity/entity";
export { EntityRef } from "./entity/entity_ref";

// Components
export type { Component, ComponentType } from "./component/component";
export { ComponentStore, type ComponentView } from "./store/component_store";
export { StoreView, StoreIter } from "./store/store_view";

// Queries
export {
  ENTITY,
  QueryIter,
  TERM,
  read,
  write,
  type EntityTerm,
  type QueryRow,
  type QueryTerm,
  type Read,
  type ReadTerm,
  type TermValue,
  type Write,
} from "./query/query";

// Errors
export { AppError, ECSError, ECS_ERROR, is_ecs_error } from "./utils/error";

// Logging
export {
  SILENT_LOGGER,
  create_console_logger,
  type LogContext,
  type Logger,
} from "./utils/logger";
