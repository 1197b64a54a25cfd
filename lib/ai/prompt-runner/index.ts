export { runStructuredJsonPrompt, runTextPrompt } from "@/lib/ai/prompt-runner/runner";
export { substituteTemplateVars } from "@/lib/ai/prompt-runner/template";
export type {
  AIErrorCategory,
  AIExecutionPattern,
  PromptRunnerError,
  PromptRunnerResult,
  PromptRunnerTelemetry,
  StructuredJsonPromptParams,
  TextPromptParams,
  ValidationResult,
} from "@/lib/ai/prompt-runner/types";
