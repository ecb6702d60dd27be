export * from "./translator";
