import { UserStore } from '../db/store';
import { Embedder } from '../embeddings/embedder';
import { CvExtractionError, EmbeddingServiceError, errorMessage } from '../errors';
import { NewUser, User } from '../types/user';
import { logger } from '../utils/logger';
import { decodeTextFile, extractTextFromPDF } from '../utils/pdf-extraction';
import { truncateText } from '../utils/text';

export interface CvFile {
  buffer: Buffer;
  mimetype: string;
  originalname: string;
}

export interface CvUploadResult {
  user: User;
  characters: number;
  /** False when the embedding service failed; the next run embeds the CV */
  embedded: boolean;
}

export const ACCEPTED_CV_TYPES = ['application/pdf', 'text/plain'];

// users.cv_filename is VARCHAR(255)
export const CV_FILENAME_MAX_LENGTH = 255;

function isPdf(file: CvFile): boolean {
  return file.mimetype === 'application/pdf' || file.originalname.toLowerCase().endsWith('.pdf');
}

/**
 * User registration and CV intake
 */
export class CvService {
  constructor(
    private store: UserStore,
    private embedder: Embedder,
    private extractPdf: (data: Uint8Array) => Promise<string> = extractTextFromPDF
  ) {}

  registerUser(user: NewUser): Promise<User> {
    return this.store.createUser({ name: user.name.trim(), email: user.email.trim() });
  }

  async extractText(file: CvFile): Promise<string> {
    let text: string;
    try {
      text = isPdf(file)
        ? await this.extractPdf(new Uint8Array(file.buffer))
        : decodeTextFile(file.buffer);
    } catch (error) {
      throw new CvExtractionError(`Could not read ${file.originalname}: ${errorMessage(error)}`, { cause: error });
    }

    // PostgreSQL text rejects NUL
    text = text.replace(/\u0000/g, '');
    if (text.trim().length === 0) {
      throw new CvExtractionError(`No text found in ${file.originalname}`);
    }
    return text;
  }

  /**
   * Replaces the user's CV (text, filename and vector) wholesale.
   * Returns null when the user does not exist.
   */
  async uploadCv(userId: number, file: CvFile): Promise<CvUploadResult | null> {
    const existing = await this.store.getUser(userId);
    if (!existing) return null;

    const cvText = await this.extractText(file);

    let cvVector: number[] | null = null;
    try {
      cvVector = await this.embedder.embed(cvText);
    } catch (error) {
      if (!(error instanceof EmbeddingServiceError)) throw error;
      logger.warn(`CV stored without embedding`, { userId, error: error.message });
    }

    const cvFilename = truncateText(file.originalname, CV_FILENAME_MAX_LENGTH);
    const user = await this.store.replaceCv(userId, { cvText, cvFilename, cvVector });
    if (!user) return null;

    logger.info(`CV uploaded`, { userId, filename: cvFilename, characters: cvText.length, embedded: cvVector !== null });
    return { user, characters: cvText.length, embedded: cvVector !== null };
  }
}
