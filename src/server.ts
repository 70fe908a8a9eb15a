import "dotenv/config";
import { createApp } from "./app";
import { createCareerAnalysisService } from "./services/career-analysis.services";
import { StudentService } from "./services/student.services";
import { loadConfig } from "./utils/config";
import logger from "./utils/logger";

const config = loadConfig();
const analysisService = createCareerAnalysisService(config);
const studentService = new StudentService(analysisService);
const app = createApp({ analysisService, studentService });

app.listen(config.port, () => {
  logger.info(`Server started successfully`, {
    port: config.port,
    model: config.ai.model,
    ai: analysisService.isAiAvailable() ? "available" : "unavailable",
  });
});
