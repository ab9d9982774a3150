import { confidenceThresholdSchema } from "../server/classification/resolver";

export interface ReclassifyArgs {
  runBy: string;
  threshold?: number;
  summerMode?: boolean;
}

export type ReclassifyArgsResult =
  | { success: true; args: ReclassifyArgs }
  | { success: false; message: string };

export const USAGE = "Usage: reclassify --run-by <name> [--threshold N] [--summer | --no-summer]";

/**
 * Reads `--run-by <name>`, `--threshold <0-100>` and `--summer` / `--no-summer`.
 * Leaving out threshold or summer mode means "use the stored setting".
 */
export function parseReclassifyArgs(argv: readonly string[]): ReclassifyArgsResult {
  let runBy: string | undefined;
  let threshold: number | undefined;
  let summerMode: boolean | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    switch (flag) {
      case "--run-by": {
        const value = inline ?? argv[++i];
        if (!value || value.startsWith("--")) return { success: false, message: "--run-by needs a name" };
        runBy = value.trim();
        break;
      }
      case "--threshold": {
        const value = inline ?? argv[++i];
        const parsed = confidenceThresholdSchema.safeParse(Number(value));
        if (value === undefined || value.trim() === "" || !parsed.success) {
          return { success: false, message: `--threshold must be an integer between 0 and 100, got ${value ?? "nothing"}` };
        }
        threshold = parsed.data;
        break;
      }
      case "--summer":
        summerMode = true;
        break;
      case "--no-summer":
        summerMode = false;
        break;
      default:
        return { success: false, message: `Unknown argument ${arg}` };
    }
  }

  if (!runBy) return { success: false, message: "--run-by is required" };
  return { success: true, args: { runBy, threshold, summerMode } };
}
