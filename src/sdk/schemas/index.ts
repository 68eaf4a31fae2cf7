export * from "./book";
export * from "./slots";
export * from "./warehouses";
