export * from "./responses";
