export * from "./links.module";
export * from "./links.service";
