import { z } from 'zod';
import { ValidationError } from '../core/errors.js';

/**
 * Text already extracted from a PDF, one entry per page. Extraction itself
 * happens outside this package.
 */
export const PageDocumentSchema = z.object({
  filePath: z.string().min(1),
  filename: z.string().min(1).optional(),
  pages: z.array(z.object({
    page: z.number().int().positive(),
    text: z.string(),
  })),
});

export type PageDocument = z.infer<typeof PageDocumentSchema>;
export type PageText = PageDocument['pages'][number];

export interface IngestReport {
  collectionName: string;
  filePath: string;
  pageCount: number;
  nodeCount: number;
  leafCount: number;
}

export function parsePageDocument(value: unknown): PageDocument {
  const parsed = PageDocumentSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
      .join('; ');
    throw new ValidationError('document', 'page document', issues);
  }
  return parsed.data;
}
