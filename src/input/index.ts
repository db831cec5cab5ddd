export {
  draftFromJson,
  draftFromPrompt,
  loadDirectory,
  loadProjectInput,
  parseJsonInput,
  PROMPT_TASK_ID,
} from "./load";
export {
  detectMarkdownFormat,
  parseMarkdown,
  validateMarkdownFormat,
  type MarkdownFormat,
} from "./markdown";
