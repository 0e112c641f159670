import express, {
  type Request,
  type Response,
  type NextFunction,
} from "express";
import cors from "cors";
import ecosystemRoutes from "./routes/ecosystemRoutes";
import { logger, LogCategory } from "../infrastructure/utils/logger";
import { HttpStatusCode } from "../shared/constants/HttpStatusCodes";
import { ResponseStatus } from "../shared/constants/ResponseEnums";
import { Environment } from "../shared/constants/EnvironmentEnums";
import { CONFIG } from "../config/config";

/**
 * Express application instance.
 *
 * Routes:
 * - `/api/ecosystem` - ecosystem state, turn advancement and interventions
 * - `/health` - Health check endpoint
 *
 * @module application
 */
const app = express();

app.use(
  cors({
    origin: CONFIG.ALLOWED_ORIGINS,
  }),
);

app.use(express.json({ limit: "1mb" }));

if (process.env.NODE_ENV !== Environment.PRODUCTION) {
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.path}`, LogCategory.HTTP);
    next();
  });
}

app.get("/health", (_req: Request, res: Response) => {
  res.json({ status: ResponseStatus.OK });
});

app.use("/", ecosystemRoutes);

app.use(
  (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    const errorMessage =
      process.env.NODE_ENV === Environment.PRODUCTION
        ? "Internal server error"
        : err.message;
    logger.error("Unhandled error:", LogCategory.HTTP, { error: err.message });
    res
      .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
      .json({ error: errorMessage });
  },
);

app.use((_req: Request, res: Response): void => {
  res.status(HttpStatusCode.NOT_FOUND).json({ error: "Route not found" });
});

export default app;
