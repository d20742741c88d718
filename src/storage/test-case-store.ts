import path from 'path';
import {
  NewTestCaseDocument,
  TestCaseDocument,
  TestCaseDocumentSummary,
} from '../models/test-case-document';
import { collectionDir, listJSONFiles, readJSON, readJSONIfExists, serializeUpdate, writeJSON } from './json-storage';
import { generateUrlKey, isValidUrlKey } from '../utils/uuid-generator';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

const COLLECTION = 'test-cases';

function documentPath(urlKey: string): string {
  return path.join(collectionDir(COLLECTION), `${urlKey}.json`);
}

export async function saveTestCaseDocument(input: NewTestCaseDocument): Promise<TestCaseDocument> {
  const document: TestCaseDocument = {
    ...input,
    url_key: generateUrlKey(),
    created_at: new Date().toISOString(),
    status: input.status ?? {},
  };

  await writeJSON(documentPath(document.url_key), document);
  logger.info('Test case document saved', {
    url_key: document.url_key,
    source_type: document.source_type,
    test_case_count: document.test_data.length,
  });

  return document;
}

export async function getTestCaseDocument(urlKey: string): Promise<TestCaseDocument | null> {
  if (!isValidUrlKey(urlKey)) {
    return null;
  }
  return readJSONIfExists<TestCaseDocument>(documentPath(urlKey));
}

/**
 * Sets the status of one test case, addressed by its title. The record's
 * own `status` is kept in step with the status map.
 */
export async function updateTestCaseStatus(
  urlKey: string,
  testCaseTitle: string,
  status: string
): Promise<TestCaseDocument | null> {
  if (!isValidUrlKey(urlKey)) {
    return null;
  }

  return serializeUpdate(documentPath(urlKey), async () => {
    const document = await getTestCaseDocument(urlKey);
    if (!document) {
      return null;
    }

    const updated: TestCaseDocument = {
      ...document,
      status: { ...document.status, [testCaseTitle]: status },
      test_data: document.test_data.map(record =>
        record.title === testCaseTitle ? { ...record, status } : record
      ),
      status_updated_at: new Date().toISOString(),
    };

    await writeJSON(documentPath(urlKey), updated);
    logger.info('Test case status updated', { url_key: urlKey, test_case_id: testCaseTitle, status });

    return updated;
  });
}

export async function replaceStatusValues(
  urlKey: string,
  statusValues: Record<string, string>
): Promise<TestCaseDocument | null> {
  if (!isValidUrlKey(urlKey)) {
    return null;
  }

  return serializeUpdate(documentPath(urlKey), async () => {
    const document = await getTestCaseDocument(urlKey);
    if (!document) {
      logger.warn('No document found to update status for', { url_key: urlKey });
      return null;
    }

    const updated: TestCaseDocument = {
      ...document,
      status: { ...statusValues },
      status_updated_at: new Date().toISOString(),
    };

    await writeJSON(documentPath(urlKey), updated);
    return updated;
  });
}

export async function listRecentDocuments(limit: number = 20): Promise<TestCaseDocumentSummary[]> {
  const dir = collectionDir(COLLECTION);
  const files = await listJSONFiles(dir);

  const documents: TestCaseDocument[] = [];
  for (const file of files) {
    try {
      documents.push(await readJSON<TestCaseDocument>(path.join(dir, file)));
    } catch (error) {
      logger.warn('Failed to read test case document', { file, error: errorMessage(error) });
    }
  }

  documents.sort((a, b) => new Date(b.created_at).getTime() - new Date(a.created_at).getTime());

  return documents.slice(0, limit).map(document => ({
    url_key: document.url_key,
    source_type: document.source_type,
    item_ids: document.item_ids,
    created_at: document.created_at,
    test_case_count: document.test_data.length,
  }));
}
