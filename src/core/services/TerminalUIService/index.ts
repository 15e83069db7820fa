export * from "./TerminalUIService"
