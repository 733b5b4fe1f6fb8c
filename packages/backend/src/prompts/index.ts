export { buildChatSystemPrompt } from "./chat.js";
export { buildSimplifySystemPrompt, buildSimplifyUserPrompt } from "./simplify.js";
