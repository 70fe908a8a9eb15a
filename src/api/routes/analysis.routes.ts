import express, { NextFunction, Request, Response } from "express";
import { riasecSubmissionSchema } from "../../schemas/student-schemas";
import type { CareerAnalysisService } from "../../services/career-analysis.services";
import type { StudentService } from "../../services/student.services";
import { HttpError } from "../../utils/errors";
import logger from "../../utils/logger";
import { parseBody, sendSuccess } from "../http-response";

/**
 * AI analyses of a registered student. A degraded (fallback) analysis is
 * still a successful response; its `source` says where it came from.
 */
export function createAnalysisRouter(
  students: StudentService,
  analysis: CareerAnalysisService,
) {
  const router = express.Router();

  /**
   * POST /students/:studentId/riasec
   * Scores assessment answers and stores AI-produced scores on the profile.
   */
  router.post(
    "/students/:studentId/riasec",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { studentId } = req.params;
        students.getById(studentId);
        const { responses } = parseBody(riasecSubmissionSchema, req.body);

        logger.info("RIASEC assessment submitted", {
          studentId,
          responses: responses.length,
        });

        const result = await analysis.analyzeRiasec(responses);
        if (result.source === "ai") {
          students.updateRiasecScores(studentId, {
            realistic: result.realistic,
            investigative: result.investigative,
            artistic: result.artistic,
            social: result.social,
            enterprising: result.enterprising,
            conventional: result.conventional,
          });
        }

        sendSuccess(res, "RIASEC analysis completed successfully", result);
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * POST /students/:studentId/career-recommendations
   */
  router.post(
    "/students/:studentId/career-recommendations",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const student = students.getById(req.params.studentId);
        const result = await analysis.recommendCareers(student);
        sendSuccess(res, "Career recommendations generated successfully", result);
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * POST /students/:studentId/learning-path?targetCareer=...
   */
  router.post(
    "/students/:studentId/learning-path",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const student = students.getById(req.params.studentId);
        const { targetCareer } = req.query;
        if (typeof targetCareer !== "string" || !targetCareer.trim()) {
          throw new HttpError(400, "targetCareer query parameter is required");
        }

        const result = await analysis.generateLearningPath(student, targetCareer);
        sendSuccess(res, "Learning path generated successfully", result);
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
