export * from "./lib/errors.js";
export * from "./lib/formatting.js";
export * from "./lib/constants.js";
export * from "./lib/geometry/bolt-geometry.js";
export * from "./lib/geometry/registry.js";
export * from "./lib/naming/name-codec.js";
export * from "./lib/validation/template-validator.js";
export * from "./lib/store/types.js";
export * from "./lib/store/assets.js";
export * from "./lib/store/document-store.js";
export * from "./lib/store/material-document.js";
export * from "./lib/store/material-dump.js";
export * from "./lib/catalog/table.js";
export * from "./lib/catalog/type-catalogs.js";
export * from "./lib/catalog/lookup-tables.js";
export * from "./lib/catalog/geometry-html.js";
export * from "./lib/catalog/schedules.js";
export * from "./lib/reconcile/counters.js";
export * from "./lib/reconcile/engine.js";
export * from "./lib/reconcile/summary.js";
export * from "./lib/reconcile/pass.js";
export * from "./lib/config.js";
export * from "./lib/file-sink.js";
export * from "./lib/pass-log.js";
export * from "./lib/prompt.js";
export { Output, type OutputOptions } from "./lib/output.js";
