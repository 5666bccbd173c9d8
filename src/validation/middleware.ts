import { z } from 'zod';
import { normalizeValidationError } from './errors';

type ToolHandler<TInput, Args extends unknown[], TResult> = (
  input: TInput,
  ...rest: Args
) => TResult | Promise<TResult>;

/**
 * Parse a tool's first argument with `schema` before the handler sees it.
 * Failures surface as ValidationError and the handler is never called.
 */
export function validate<TSchema extends z.ZodTypeAny>(schema: TSchema) {
  return <Args extends unknown[], TResult>(handler: ToolHandler<z.infer<TSchema>, Args, TResult>) =>
    async (input: unknown, ...rest: Args): Promise<TResult> => {
      const parsed = await schema.safeParseAsync(input);
      if (!parsed.success) {
        throw normalizeValidationError(parsed.error);
      }
      return handler(parsed.data, ...rest);
    };
}
