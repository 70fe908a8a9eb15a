import express, { NextFunction, Request, Response } from "express";
import { chatRequestSchema } from "../../schemas/student-schemas";
import type { CareerAnalysisService } from "../../services/career-analysis.services";
import type { StudentService } from "../../services/student.services";
import { parseBody, sendSuccess } from "../http-response";

export function createChatRouter(
  students: StudentService,
  analysis: CareerAnalysisService,
) {
  const router = express.Router();

  /**
   * POST /chat
   * Counselling reply; a known `studentId` adds the profile as context.
   */
  router.post(
    "/chat",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { message, studentId } = parseBody(chatRequestSchema, req.body);
        const profile = studentId ? students.getById(studentId) : undefined;
        const result = await analysis.chat(message, profile);
        sendSuccess(res, "Reply generated successfully", result);
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
