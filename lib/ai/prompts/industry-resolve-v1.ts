// Shared prompt text for `industry.resolve.v1`.

export const INDUSTRY_RESOLVE_V1_SYSTEM = `Identify the primary industry of a company from its name and website.

Return only the industry as 1-4 words in Title Case (for example "Logistics", "Dental Clinics", "B2B SaaS"). If you cannot tell, return exactly: Unknown`;
