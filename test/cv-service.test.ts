import { describe, expect, it } from 'vitest';
import { CvExtractionError } from '../src/errors';
import { CvFile, CvService } from '../src/services/cv-service';
import { FakeEmbedder } from './fakes/fakes';
import { InMemoryStore } from './fakes/in-memory-store';

function textFile(content: string, originalname = 'cv.txt'): CvFile {
  return { buffer: Buffer.from(content, 'utf-8'), mimetype: 'text/plain', originalname };
}

const fakePdf = async (data: Uint8Array) => `PDF with ${data.length} bytes`;

describe('CvService', () => {
  it('registers users with trimmed fields', async () => {
    const service = new CvService(new InMemoryStore(), new FakeEmbedder(), fakePdf);

    const user = await service.registerUser({ name: '  Ada  ', email: ' ada@example.com ' });

    expect(user.name).toBe('Ada');
    expect(user.email).toBe('ada@example.com');
  });

  it('stores the extracted text and its vector', async () => {
    const store = new InMemoryStore();
    const embedder = new FakeEmbedder(() => [0.6, 0.8]);
    const service = new CvService(store, embedder, fakePdf);
    const { id } = await store.createUser({ name: 'Ada', email: 'ada@example.com' });

    const result = await service.uploadCv(id, textFile('  TypeScript engineer \n'));

    expect(result?.characters).toBe(19);
    expect(result?.embedded).toBe(true);
    expect(store.users.get(id)).toMatchObject({
      cvText: 'TypeScript engineer',
      cvFilename: 'cv.txt',
      cvVector: [0.6, 0.8],
    });
    expect(embedder.calls).toEqual(['TypeScript engineer']);
  });

  it('routes PDFs through the PDF extractor', async () => {
    const store = new InMemoryStore();
    const service = new CvService(store, new FakeEmbedder(), fakePdf);
    const { id } = await store.createUser({ name: 'Ada', email: 'ada@example.com' });

    await service.uploadCv(id, { buffer: Buffer.from('%PDF-1.4'), mimetype: 'application/pdf', originalname: 'cv.pdf' });

    expect(store.users.get(id)?.cvText).toBe('PDF with 8 bytes');
  });

  it('replaces the previous CV wholesale', async () => {
    const store = new InMemoryStore();
    const vectors = [[1, 0], [0, 1]];
    const service = new CvService(store, new FakeEmbedder(() => vectors.shift() ?? []), fakePdf);
    const { id } = await store.createUser({ name: 'Ada', email: 'ada@example.com' });

    await service.uploadCv(id, textFile('First CV', 'first.txt'));
    await service.uploadCv(id, textFile('Second CV', 'second.txt'));

    expect(store.users.get(id)).toMatchObject({ cvText: 'Second CV', cvFilename: 'second.txt', cvVector: [0, 1] });
  });

  it('keeps the CV without a vector when embedding fails', async () => {
    const store = new InMemoryStore();
    const service = new CvService(store, new FakeEmbedder(undefined, 'CV'), fakePdf);
    const { id } = await store.createUser({ name: 'Ada', email: 'ada@example.com' });
    await store.replaceCv(id, { cvText: 'Old', cvFilename: 'old.txt', cvVector: [1, 0] });

    const result = await service.uploadCv(id, textFile('New CV'));

    expect(result?.embedded).toBe(false);
    expect(store.users.get(id)).toMatchObject({ cvText: 'New CV', cvVector: null });
  });

  it('truncates long filenames and drops NUL characters from the text', async () => {
    const store = new InMemoryStore();
    const service = new CvService(store, new FakeEmbedder(), fakePdf);
    const { id } = await store.createUser({ name: 'Ada', email: 'ada@example.com' });

    const result = await service.uploadCv(id, textFile('Type\u0000Script', `${'n'.repeat(300)}.txt`));

    expect(result?.user.cvFilename).toBe('n'.repeat(255));
    expect(result?.user.cvText).toBe('TypeScript');
  });

  it('returns null for an unknown user', async () => {
    const service = new CvService(new InMemoryStore(), new FakeEmbedder(), fakePdf);

    await expect(service.uploadCv(42, textFile('CV'))).resolves.toBeNull();
  });

  it('rejects a file with no text', async () => {
    const service = new CvService(new InMemoryStore(), new FakeEmbedder(), fakePdf);

    await expect(service.extractText(textFile('   \n ', 'blank.txt'))).rejects.toThrow(
      new CvExtractionError('No text found in blank.txt')
    );
  });

  it('wraps extractor failures', async () => {
    const service = new CvService(new InMemoryStore(), new FakeEmbedder(), async () => {
      throw new Error('Invalid PDF structure');
    });

    await expect(
      service.extractText({ buffer: Buffer.from('nope'), mimetype: 'application/pdf', originalname: 'broken.pdf' })
    ).rejects.toThrow('Could not read broken.pdf: Invalid PDF structure');
  });

  it('decodes Latin-1 text files', () => {
    const service = new CvService(new InMemoryStore(), new FakeEmbedder(), fakePdf);
    const file: CvFile = { buffer: Buffer.from([0x43, 0x61, 0x66, 0xe9]), mimetype: 'text/plain', originalname: 'cv.txt' };

    return expect(service.extractText(file)).resolves.toBe('Café');
  });
});
