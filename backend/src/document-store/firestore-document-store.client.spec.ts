import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  FIRESTORE_DOCUMENTS_API,
  FirestoreDocumentStoreClient,
  toFirestoreFields,
} from './firestore-document-store.client';

describe('toFirestoreFields', () => {
  it('encodes each value type', () => {
    const fields = toFirestoreFields({
      title: 'Test',
      duration: 12.5,
      createdAt: new Date('2026-01-02T03:04:05.000Z'),
      shared: false,
      note: null,
    });

    expect(fields).toEqual({
      title: { stringValue: 'Test' },
      duration: { doubleValue: 12.5 },
      createdAt: { timestampValue: '2026-01-02T03:04:05.000Z' },
      shared: { booleanValue: false },
      note: { nullValue: 'NULL_VALUE' },
    });
  });
});

describe('FirestoreDocumentStoreClient', () => {
  let client: FirestoreDocumentStoreClient;
  let documents: { patch: jest.Mock };

  const build = async (settings: Record<string, string>) => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FirestoreDocumentStoreClient,
        { provide: FIRESTORE_DOCUMENTS_API, useValue: documents },
        { provide: ConfigService, useValue: new ConfigService(settings) },
      ],
    }).compile();
    return module.get(FirestoreDocumentStoreClient);
  };

  beforeEach(async () => {
    documents = { patch: jest.fn().mockResolvedValue({ data: {} }) };
    client = await build({ FIRESTORE_PROJECT_ID: 'test-project' });
  });

  it('patches the full document name in the default database', async () => {
    await client.write('users/u1/recordings/r1', { title: 'Test' });

    expect(documents.patch).toHaveBeenCalledWith({
      name: 'projects/test-project/databases/(default)/documents/users/u1/recordings/r1',
      requestBody: { fields: { title: { stringValue: 'Test' } } },
    });
  });

  it('targets a named database when configured', async () => {
    client = await build({ FIRESTORE_PROJECT_ID: 'test-project', FIRESTORE_DATABASE_ID: 'audio' });

    await client.write('users/u1/recordings/r1', { title: 'Test' });

    expect(documents.patch.mock.calls[0][0].name).toBe(
      'projects/test-project/databases/audio/documents/users/u1/recordings/r1',
    );
  });

  it('propagates write errors', async () => {
    documents.patch.mockRejectedValue(new Error('PERMISSION_DENIED'));

    await expect(client.write('users/u1/recordings/r1', {})).rejects.toThrow('PERMISSION_DENIED');
  });
});
