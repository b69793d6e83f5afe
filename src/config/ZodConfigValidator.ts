import { ZodError } from "zod";
import { AppConfig, AppConfigSchema } from "./schemas";
import { ConfigValidationError } from "../errors";

export class ZodConfigValidator {
  static validate(config: unknown): AppConfig {
    try {
      return AppConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = error.issues.map((issue) => {
          const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
          return `${path}${issue.message}`;
        });
        throw new ConfigValidationError(issues);
      }
      throw error;
    }
  }
}
