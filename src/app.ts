import express from "express";
import {
  errorHandler,
  notFoundHandler,
} from "./api/middlewares/error.middleware";
import { createAnalysisRouter } from "./api/routes/analysis.routes";
import { createChatRouter } from "./api/routes/chat.routes";
import { createHealthRouter } from "./api/routes/health.routes";
import { createStudentRouter } from "./api/routes/student.routes";
import type { CareerAnalysisService } from "./services/career-analysis.services";
import type { StudentService } from "./services/student.services";

export interface AppDependencies {
  analysisService: CareerAnalysisService;
  studentService: StudentService;
}

export function createApp({ analysisService, studentService }: AppDependencies) {
  const app = express();

  app.use(express.json({ limit: "100kb" }));
  app.use(createHealthRouter(analysisService));
  app.use(createStudentRouter(studentService));
  app.use(createAnalysisRouter(studentService, analysisService));
  app.use(createChatRouter(studentService, analysisService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
