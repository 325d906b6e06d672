import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { StoredDocument } from './entities/stored-document.entity';
import { PostgresDocumentStoreClient } from './postgres-document-store.client';

describe('PostgresDocumentStoreClient', () => {
  let client: PostgresDocumentStoreClient;
  let docRepo: { upsert: jest.Mock };

  beforeEach(async () => {
    docRepo = { upsert: jest.fn().mockResolvedValue({ identifiers: [], generatedMaps: [], raw: [] }) };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PostgresDocumentStoreClient,
        { provide: getRepositoryToken(StoredDocument), useValue: docRepo },
      ],
    }).compile();

    client = module.get(PostgresDocumentStoreClient);
  });

  it('upserts on the document path with dates as ISO strings', async () => {
    await client.write('users/u1/recordings/r1', {
      title: 'Test',
      duration: 12.5,
      createdAt: new Date('2026-01-02T03:04:05.000Z'),
    });

    expect(docRepo.upsert).toHaveBeenCalledWith(
      {
        path: 'users/u1/recordings/r1',
        fields: { title: 'Test', duration: 12.5, createdAt: '2026-01-02T03:04:05.000Z' },
      },
      ['path'],
    );
  });
});
