import { ZodError } from 'zod';

/** One-line description of a thrown value; zod issues are flattened to `path: message` pairs. */
export function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${where}: ${issue.message}`;
      })
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}
