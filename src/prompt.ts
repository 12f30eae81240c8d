export type TranslationPrompt = { system: string; user: string };

export function buildTranslationPrompt(params: {
  targetLanguage: string;
  relPath: string;
  content: string;
  part?: number;
  totalParts?: number;
}): TranslationPrompt {
  const { targetLanguage, relPath, content } = params;
  const system = `You are a professional translation AI with expertise in technical texts and code files.
Translate the content you are given into ${targetLanguage}, preserving its exact formatting (line breaks, indentation, and spacing).
Important:
- Translate only prose and user-facing strings, labels, messages, and display text.
- Leave identifiers, keywords, and markup structure untouched.
- Change file paths or import statements only if they contain a language code that should follow the target language.
- Ensure the translated output remains a valid file of the same type.
- Do not include additional commentary or explanations.
- Do not wrap your response in Markdown fences; return the raw file contents.`;

  const partNote = params.totalParts && params.totalParts > 1
    ? ` (part ${params.part ?? 1} of ${params.totalParts}; translate this part only)`
    : '';

  const user = `FILE: ${relPath}${partNote}
CONTENT:

${content}`;

  return { system, user };
}
