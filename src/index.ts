// World
export { World } from "./world";
export {
  WorldOptionsSchema,
  parse_world_options,
  type WorldOptions,
  type WorldConfig,
} from "./config";

// Entities
export {
  type EntityID,
  INDEX_SPAN,
  MAX_INDEX,
  MAX_GENERATION,
  create_entity_id,
  get_entity_index,
  get_entity_generation,
  format_entity,
} from "./entity/entity";
export { EntityManager } from "./entity/entity_manager";
export { EntityBuilder, type ComponentSink } from "./entity/entity_builder";

// Type keys
export {
  define_type,
  type TypeKey,
  type TypeID,
  type ComponentType,
  type ResourceType,
  type ValueOf,
  type DefineTypeOptions,
} from "./component/component";

// Components
export { ComponentManager } from "./component/component_manager";
export type { TableView, TableViewMut } from "./component/table";

// Resources
export { ResourceManager } from "./resource/resource_manager";
export {
  Time,
  type TimeState,
  create_time,
  advance_time,
  set_time_scale,
  fps,
} from "./resource/time";

// Queries
export {
  QueryBuilder,
  type QueryRow,
  type QuerySource,
  type ValuesOf,
} from "./query/query";

// Systems
export { SystemRunner } from "./system/system_runner";
export type {
  SystemID,
  SystemFn,
  SystemConfig,
  SystemDescriptor,
} from "./system/system";

// Handles
export {
  HandleAllocator,
  define_handle,
  create_id,
  as_id,
  type Handle,
  type Id,
} from "./handle";

// Errors
export {
  AppError,
  ECSError,
  ECS_ERROR,
  is_ecs_error,
} from "./utils/error";
export { PrimitiveError, PRIMITIVE_ERROR, RwLock } from "type_primitives";

// Logging
export { create_logger, type Logger, type LogLevel } from "./utils/logger";
