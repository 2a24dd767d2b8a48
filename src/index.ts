/**
 * Public API of solstice: the module manager and runtime, the building
 * blocks they are made of, and the configuration helpers.
 */
export * from "./core/types.js";
export * from "./core/errors.js";
export * from "./core/logger.js";
export * from "./core/config.js";
export * from "./core/context-store.js";
export * from "./core/template-manager.js";
export * from "./core/persistence.js";
export * from "./core/requirements.js";
export * from "./core/event-listeners/index.js";
export * from "./core/actions/index.js";
export * from "./core/module.js";
export * from "./core/module-manager.js";
export * from "./core/runtime.js";
