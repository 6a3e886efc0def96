export * from "./app.module.factory";
export * from "./bootstrap";
export * from "./bootstrap.options";
export * from "./defaults";
