export * from "./HistoryService"
