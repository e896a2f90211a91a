import express, { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { MatchStore } from '../../db/store';
import { CvService } from '../../services/cv-service';
import { User } from '../../types/user';
import { createCvUpload, handleMulterError } from '../middlewares/upload.middleware';

const SignupSchema = z.object({
  name: z.string().trim().min(1).max(255),
  email: z.string().trim().email().max(320),
});

const UserIdSchema = z.coerce.number().int().positive();

export function toUserResponse(user: User) {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    cvFilename: user.cvFilename,
    hasCv: user.cvText !== null,
    cvUpdatedAt: user.cvUpdatedAt?.toISOString() ?? null,
    createdAt: user.createdAt.toISOString(),
  };
}

export function createUsersRouter(deps: {
  cvService: CvService;
  matches: MatchStore;
  cvMaxUploadBytes: number;
}) {
  const router = express.Router();
  const upload = createCvUpload(deps.cvMaxUploadBytes);

  /**
   * POST /users
   * Registers a user for job alerts
   */
  router.post('/users', async (req: Request, res: Response, next: NextFunction) => {
    const body = SignupSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'Invalid signup payload', issues: body.error.issues });
      return;
    }

    try {
      const user = await deps.cvService.registerUser(body.data);
      res.status(201).json(toUserResponse(user));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /users/:id/cv
   * Uploads (or replaces) the user's CV from the multipart 'cv' field
   */
  router.post(
    '/users/:id/cv',
    upload.single('cv'),
    handleMulterError,
    async (req: Request, res: Response, next: NextFunction) => {
      const userId = UserIdSchema.safeParse(req.params.id);
      if (!userId.success) {
        res.status(400).json({ error: 'Invalid user id' });
        return;
      }

      if (!req.file) {
        res.status(400).json({ error: "A CV file is required in the 'cv' field." });
        return;
      }

      try {
        const result = await deps.cvService.uploadCv(userId.data, req.file);
        if (!result) {
          res.status(404).json({ error: 'User not found' });
          return;
        }

        res.status(200).json({
          userId: result.user.id,
          cvFilename: result.user.cvFilename,
          characters: result.characters,
          dimensions: result.user.cvVector?.length ?? 0,
          embedded: result.embedded,
        });
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /users/:id/matches
   * Jobs the user has been notified about, newest first
   */
  router.get('/users/:id/matches', async (req: Request, res: Response, next: NextFunction) => {
    const userId = UserIdSchema.safeParse(req.params.id);
    if (!userId.success) {
      res.status(400).json({ error: 'Invalid user id' });
      return;
    }

    try {
      const matches = await deps.matches.listMatchesForUser(userId.data);
      res.json({
        userId: userId.data,
        matches: matches.map(match => ({
          jobId: match.jobId,
          title: match.job.title,
          company: match.job.company,
          url: match.job.url,
          score: match.score,
          notifiedAt: match.notifiedAt.toISOString(),
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
