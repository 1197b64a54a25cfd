export function substituteTemplateVars(template: string, vars?: Record<string, string>): string {
  if (!vars) return template;
  let out = template;
  for (const [key, value] of Object.entries(vars)) {
    out = out.replaceAll(`{{${key}}}`, value);
    out = out.replaceAll(`{${key}}`, value);
  }
  return out;
}
