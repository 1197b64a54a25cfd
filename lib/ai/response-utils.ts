import type { ModelResponse } from "@/lib/ai/openai-client";

export function extractJsonObjectFromText(text: string): string {
  const cleaned = text.replace(/```json\n?|\n?```/g, "").trim();
  const first = cleaned.indexOf("{");
  const last = cleaned.lastIndexOf("}");
  if (first >= 0 && last > first) return cleaned.slice(first, last + 1);
  return cleaned;
}

export function getTrimmedOutputText(response: ModelResponse): string | null {
  const text = response.output_text?.trim() || "";
  return text ? text : null;
}

export function isTruncatedResponse(response: ModelResponse): boolean {
  return response.status === "incomplete" && response.incomplete_details?.reason === "max_output_tokens";
}

export function summarizeResponse(response: ModelResponse): string {
  const parts: string[] = [];
  if (response.status) parts.push(`status=${response.status}`);
  const incomplete = response.incomplete_details?.reason;
  if (incomplete) parts.push(`incomplete=${incomplete}`);
  return parts.join(" ");
}
