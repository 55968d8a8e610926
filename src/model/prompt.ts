import type OpenAI from 'openai';

export const SYSTEM_PROMPT = `You extract structured data from job posting pages. Respond ONLY with a valid JSON object (no markdown, no code fences) in exactly this shape:
{
  "company": "Company Name",
  "job_title": "Job Title",
  "full_description": "Complete job description text",
  "hiring_manager": "Hiring Manager Name" or "",
  "ad_source": "linkedin" or "indeed" or "glassdoor" or "generic"
}

Rules:
1. company: the hiring company's name as shown on the page, not derived from the URL.
2. job_title: the complete position name.
3. full_description: the full posting text with responsibilities, requirements, qualifications and benefits. Look inside collapsed or "show more" regions (on LinkedIn usually under "About the job"). When several candidate descriptions exist, return the longest complete one.
4. hiring_manager: the person named in a "Meet the hiring team", "Hiring team", recruiter or hiring manager section, in First Last form. Return "" when no name is shown.
5. ad_source: "linkedin", "indeed" or "glassdoor" when the URL or page belongs to that board, otherwise "generic".`;

export function buildUserPrompt(url: string, html: string): string {
  return `Page URL: ${url}\n\nHTML Content:\n${html}`;
}

export function buildExtractionMessages(
  url: string,
  html: string,
): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: buildUserPrompt(url, html) },
  ];
}
