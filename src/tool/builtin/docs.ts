// pattern: Imperative Shell

/**
 * Documentation lookup over a static catalogue shipped beside this module.
 * The catalogue is read and validated once, when the docs tools are created.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createReportBuilder } from '../../render/index.ts';
import { errorResult, textResult } from '../result.ts';
import type { Tool, ToolParameter } from '../types.ts';

const DocEntrySchema = z.object({
  title: z.string().min(1),
  link: z.string().url(),
  snippet: z.string(),
});

const DocSectionSchema = z.object({
  heading: z.string().min(1),
  more: z.object({
    label: z.string().min(1),
    url: z.string().url(),
  }),
  entries: z.array(DocEntrySchema),
});

const ErrorDocSchema = z.object({
  code: z.string().min(1),
  title: z.string().min(1),
  description: z.string(),
  solution: z.array(z.string()),
  references: z.array(z.string().url()),
});

export const DocsCatalogSchema = z.object({
  gcp: DocSectionSchema,
  kubernetes: DocSectionSchema,
  errors: z.array(ErrorDocSchema),
});

export type DocsCatalog = z.infer<typeof DocsCatalogSchema>;
export type DocSection = z.infer<typeof DocSectionSchema>;
type ErrorDoc = z.infer<typeof ErrorDocSchema>;

export const DEFAULT_DOCS_CATALOG_PATH = fileURLToPath(new URL('./docs-catalog.json', import.meta.url));

export function loadDocsCatalog(path: string = DEFAULT_DOCS_CATALOG_PATH): DocsCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const parsed = DocsCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`invalid docs catalog ${path}: ${issues}`);
  }
  return parsed.data;
}

export function searchSection(section: DocSection, query: string, limit: number): DocSection['entries'] {
  const needle = query.toLowerCase();
  return section.entries
    .filter(
      (entry) =>
        entry.title.toLowerCase().includes(needle) || entry.snippet.toLowerCase().includes(needle),
    )
    .slice(0, limit);
}

function renderSearch(section: DocSection, query: string, limit: number): string {
  const matches = searchSection(section, query, limit);
  if (matches.length === 0) {
    return `No documentation found for query: ${query}`;
  }

  const report = createReportBuilder().heading(1, `${section.heading} Search Results for "${query}"`);
  matches.forEach((entry, i) => {
    report
      .heading(2, `${i + 1}. ${entry.title}`)
      .paragraph(`**URL**: [${entry.link}](${entry.link})`)
      .paragraph(entry.snippet);
  });

  return report
    .paragraph(`For more results, visit the [${section.more.label}](${section.more.url}).`)
    .toString();
}

function findErrorDoc(
  errors: ReadonlyArray<ErrorDoc>,
  code: string | undefined,
  message: string | undefined,
): ErrorDoc | undefined {
  if (code !== undefined) {
    const wanted = code.toUpperCase();
    const byCode = errors.find((doc) => doc.code.toUpperCase() === wanted);
    if (byCode) {
      return byCode;
    }
  }
  if (message !== undefined) {
    const needle = message.toLowerCase();
    return errors.find((doc) => doc.description.toLowerCase().includes(needle));
  }
  return undefined;
}

function renderErrorDoc(doc: ErrorDoc): string {
  const report = createReportBuilder()
    .heading(1, doc.title)
    .heading(2, 'Description')
    .paragraph(doc.description)
    .heading(2, 'Solution')
    .numbered(doc.solution);

  if (doc.references.length > 0) {
    report.heading(2, 'References');
    for (const reference of doc.references) {
      report.bullet(`[${reference}](${reference})`);
    }
  }

  return report.toString();
}

function renderMissingErrorDoc(code: string | undefined, message: string | undefined): string {
  let summary = 'No documentation found for the specified error.';
  if (code !== undefined) {
    summary += ` Error code: ${code}`;
  }
  if (message !== undefined) {
    summary += ` Error message: ${message}`;
  }

  return createReportBuilder()
    .paragraph(summary)
    .paragraph('Try searching the Google Cloud documentation or Kubernetes documentation for more information.')
    .toString();
}

function searchParameters(): ReadonlyArray<ToolParameter> {
  return [
    {
      name: 'query',
      type: 'string',
      description: 'The search query',
      required: true,
    },
    {
      name: 'max_results',
      type: 'number',
      description: 'Maximum number of results to return (default: 5)',
      required: false,
      default: 5,
      positive: true,
    },
  ];
}

export function createDocTools(catalog: DocsCatalog): Array<Tool> {
  function searchTool(name: string, description: string, section: DocSection): Tool {
    return {
      definition: { name, description, parameters: searchParameters() },
      handler: async (args) =>
        textResult(
          renderSearch(section, args.string('query'), Math.max(1, Math.floor(args.number('max_results')))),
        ),
    };
  }

  const get_error_docs: Tool = {
    definition: {
      name: 'get_error_docs',
      description: 'Gets documentation for a specific error code or message',
      parameters: [
        {
          name: 'error_code',
          type: 'string',
          description: 'The error code to look up',
          required: false,
        },
        {
          name: 'error_message',
          type: 'string',
          description: 'The error message to look up',
          required: false,
        },
      ],
    },
    handler: async (args) => {
      const code = args.optionalString('error_code');
      const message = args.optionalString('error_message');
      if (code === undefined && message === undefined) {
        return errorResult('either error_code or error_message must be provided');
      }

      const doc = findErrorDoc(catalog.errors, code, message);
      return textResult(doc ? renderErrorDoc(doc) : renderMissingErrorDoc(code, message));
    },
  };

  return [
    searchTool('search_gcp_docs', 'Searches Google Cloud documentation', catalog.gcp),
    searchTool('search_k8s_docs', 'Searches Kubernetes documentation', catalog.kubernetes),
    get_error_docs,
  ];
}
