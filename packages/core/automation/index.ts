export * from "./types";
export {
  createHttpAutomationClient,
  createNullAutomationClient,
  type HttpAutomationConfig,
} from "./client";
