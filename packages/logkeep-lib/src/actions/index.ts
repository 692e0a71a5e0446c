export * from "./logs";
