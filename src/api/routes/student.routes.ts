import express, { NextFunction, Request, Response } from "express";
import {
  studentProfileSchema,
  studentProfileUpdateSchema,
} from "../../schemas/student-schemas";
import type { StudentService } from "../../services/student.services";
import logger from "../../utils/logger";
import { parseBody, sendSuccess } from "../http-response";

/**
 * Profile registration, lookup and update.
 */
export function createStudentRouter(students: StudentService) {
  const router = express.Router();

  /**
   * POST /students
   * Registers a profile. An id is generated when the body carries none.
   */
  router.post("/students", (req: Request, res: Response, next: NextFunction) => {
    try {
      const profile = parseBody(studentProfileSchema, req.body);
      const student = students.register(profile);
      sendSuccess(res, "Student registered successfully", student, 201);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /students/:studentId
   */
  router.get(
    "/students/:studentId",
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const student = students.getById(req.params.studentId);
        sendSuccess(res, "Student retrieved successfully", student);
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * PUT /students/:studentId
   * Merges the body into the stored profile and drops the student's cached analyses.
   */
  router.put(
    "/students/:studentId",
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const { studentId } = req.params;
        const changes = parseBody(studentProfileUpdateSchema, req.body);
        logger.info("Profile update received", {
          studentId,
          fields: Object.keys(changes),
        });
        const student = students.update(studentId, changes);
        sendSuccess(res, "Profile updated successfully", student);
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
