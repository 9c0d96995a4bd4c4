import { z } from 'zod';
import { OUTPUT_FORMATS } from '../utils/articleFormatter';

// article.extract tool schemas
export const ExtractArticleInput = z.object({
  html: z.string().min(1).describe('Raw HTML of the page to extract the article from'),
  url: z
    .string()
    .url()
    .optional()
    .describe('URL the HTML was fetched from; relative links and images are resolved against it'),
  format: z
    .enum(OUTPUT_FORMATS)
    .default('json')
    .describe(
      'Response format: "json" for every result field, "markdown" for the article body, "text" for a short summary (default: json)'
    ),
  minWordCount: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Minimum word count before the result is flagged as low content (default: 150)'),
  includeImages: z
    .boolean()
    .optional()
    .describe('Keep images, video and audio in the output (default: true)'),
  includeCode: z.boolean().optional().describe('Keep code blocks in the output (default: true)'),
  maxOutputChars: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Trim content and Markdown to at most this many characters; 0 disables the limit'),
  languageHint: z
    .string()
    .min(1)
    .optional()
    .describe('Language code to report when the document does not declare one (e.g. "en")'),
});

export const ExtractArticleOutput = z.object({
  title: z.string().describe('Article title; empty when none was found'),
  content: z.string().describe('Sanitized HTML of the article'),
  markdown: z.string().describe('GitHub-flavored Markdown rendering of the article'),
  excerpt: z.string().describe('Leading text of the article, cut at a word boundary'),
  word_count: z.number().int().describe('Words in the Markdown rendering'),
  success: z.boolean(),
  error: z.string().nullable(),
  url: z.string(),
  author: z.string().nullable(),
  date_published: z.string().nullable().describe('Publication date as declared by the page'),
  language: z.string().nullable(),
  warnings: z.array(z.string()).describe('Low content, missing metadata and unresolved URL notices'),
});

export type ExtractArticleInputType = z.infer<typeof ExtractArticleInput>;
export type ExtractArticleOutputType = z.infer<typeof ExtractArticleOutput>;
