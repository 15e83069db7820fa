export * from "./ProcessService"
