export * from "./documents"
