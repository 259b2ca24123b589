import { z } from "zod";
import { MazeConfigSchema, type ValidatedMazeConfig } from "../schemas/maze";
import { MazeError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

/**
 * Validate raw maze settings and fill in defaults.
 *
 * Unlike the maze constructor, this checks start and goal against the maze
 * bounds up front, so callers get a config error instead of an index error
 * on first grid access.
 */
export function buildMazeConfig(
  input: unknown,
): Result<ValidatedMazeConfig, MazeError> {
  const parsed = MazeConfigSchema.safeParse(input);
  if (!parsed.success) {
    return Err(
      MazeError.configInvalid(z.prettifyError(parsed.error), {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.map(String).join("."),
          message: issue.message,
        })),
      }),
    );
  }
  return Ok(parsed.data);
}
