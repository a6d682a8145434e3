// pattern: Imperative Shell

import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync, unlinkSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createDocTools, loadDocsCatalog } from './docs.ts';
import { dispatcherFor } from '../../integration/test-helpers.ts';
import { resultText } from '../result.ts';

const dispatcher = dispatcherFor(createDocTools(loadDocsCatalog()));

describe('search_gcp_docs', () => {
  it('should match titles and snippets case-insensitively', async () => {
    const result = await dispatcher.invoke('search_gcp_docs', { query: 'LOGGING' });

    expect(resultText(result)).toBe(
      [
        '# Google Cloud Documentation Search Results for "LOGGING"',
        '',
        '## 1. Logging | Google Cloud',
        '',
        '**URL**: [https://cloud.google.com/logging](https://cloud.google.com/logging)',
        '',
        'Logging allows you to store, search, analyze, monitor, and alert on log data and events from Google Cloud and Amazon Web Services.',
        '',
        'For more results, visit the [Google Cloud documentation](https://cloud.google.com/docs).',
      ].join('\n'),
    );
  });

  it('should report a query with no matches', async () => {
    const result = await dispatcher.invoke('search_gcp_docs', { query: 'quantum' });

    expect(result).toEqual({
      content: [{ type: 'text', text: 'No documentation found for query: quantum' }],
      isError: false,
    });
  });
});

describe('search_k8s_docs', () => {
  it('should cap results at max_results', async () => {
    const result = await dispatcher.invoke('search_k8s_docs', { query: 'debug', max_results: 2 });
    const headings = resultText(result)
      .split('\n')
      .filter((line) => line.startsWith('## '));

    expect(headings).toEqual([
      '## 1. Troubleshooting Applications | Kubernetes',
      '## 2. Debugging Pods | Kubernetes',
    ]);
  });
});

describe('get_error_docs', () => {
  it('should look up an error code case-insensitively', async () => {
    const result = await dispatcher.invoke('get_error_docs', { error_code: 'permission_denied' });

    expect(resultText(result)).toBe(
      [
        '# Permission Denied Error',
        '',
        '## Description',
        '',
        'This error occurs when the authenticated user does not have sufficient permissions to perform the requested operation.',
        '',
        '## Solution',
        '',
        '1. Check the IAM permissions for the user or service account.',
        '2. Grant the necessary roles or permissions.',
        '3. Verify that the service account has the required scopes.',
        '',
        '## References',
        '',
        '- [https://cloud.google.com/iam/docs/overview](https://cloud.google.com/iam/docs/overview)',
        '- [https://cloud.google.com/iam/docs/troubleshooting-access](https://cloud.google.com/iam/docs/troubleshooting-access)',
      ].join('\n'),
    );
  });

  it('should fall back to matching the message against descriptions', async () => {
    const result = await dispatcher.invoke('get_error_docs', {
      error_code: 'UNKNOWN_CODE',
      error_message: 'Quota has been exceeded',
    });

    expect(resultText(result).split('\n')[0]).toBe('# Resource Exhausted Error');
  });

  it('should explain when nothing matches', async () => {
    const result = await dispatcher.invoke('get_error_docs', { error_code: 'TEAPOT' });

    expect(resultText(result)).toBe(
      'No documentation found for the specified error. Error code: TEAPOT\n\n' +
        'Try searching the Google Cloud documentation or Kubernetes documentation for more information.',
    );
    expect(result.isError).toBe(false);
  });

  it('should require a code or a message', async () => {
    const result = await dispatcher.invoke('get_error_docs', { error_code: '' });

    expect(result).toEqual({
      content: [{ type: 'text', text: 'either error_code or error_message must be provided' }],
      isError: true,
    });
  });
});

describe('loadDocsCatalog', () => {
  const path = join(tmpdir(), `test-docs-${Date.now()}.json`);

  afterEach(() => {
    try {
      unlinkSync(path);
    } catch {
      // file might not exist
    }
  });

  it('should reject a catalogue that does not match the schema', () => {
    writeFileSync(path, JSON.stringify({ gcp: { heading: 'x' } }));

    expect(() => loadDocsCatalog(path)).toThrow(`invalid docs catalog ${path}: `);
  });

  it('should load the bundled catalogue', () => {
    const catalog = loadDocsCatalog();

    expect(catalog.gcp.entries.length).toBe(5);
    expect(catalog.errors.map((e) => e.code)).toContain('DEADLINE_EXCEEDED');
  });
});
