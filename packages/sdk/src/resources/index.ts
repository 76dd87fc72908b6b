export { AgentsResource } from "./agents.js";
export {
  KnowledgeResource,
  DEFAULT_MAX_RESULTS,
  buildSearchPayload,
  buildContributePayload,
  buildFeedbackPayload,
} from "./knowledge.js";
