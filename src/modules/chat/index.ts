/**
 * Chat Module
 * ===========
 */

export { createChatRouter } from "./chat.routes.js";
export type { ChatInput } from "./chat.schemas.js";
export {
  createOpenAiRagService,
  createUnavailableRagService,
  type RagAnswer,
  type RagService,
  type ResponsesClient,
} from "./chat.service.js";
