export * from "./types.js";
export * from "./errors.js";
export * from "./dispatch.js";
export * from "./message-buffer.js";
export * from "./handler-registry.js";
export * from "./provider-selection.js";
export * from "./message-proxy.js";
export * from "./lifecycle.js";
export * from "./create-messaging.js";
