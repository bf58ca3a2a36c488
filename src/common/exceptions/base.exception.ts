import { HttpException, HttpStatus } from '@nestjs/common';

export type ExceptionContext = Record<string, unknown>;

/**
 * Root of the transliteration error hierarchy.
 *
 * Each subclass fixes an HTTP status and a stable `errorCode`; the context
 * object travels to the error response as `details`. Token and input
 * positions in the context are echoed in the message, e.g.
 * `No matching transliteration rule for token 'b' [Token: 2]`.
 */
export abstract class BaseException extends HttpException {
  public readonly errorCode: string;
  public readonly context: ExceptionContext;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: HttpStatus,
    errorCode: string,
    context: ExceptionContext = {},
  ) {
    const timestamp = new Date().toISOString();
    const located = BaseException.withLocation(message, context);

    super(
      {
        statusCode,
        errorCode,
        message: located,
        context,
        timestamp,
      },
      statusCode,
    );
    this.errorCode = errorCode;
    this.context = context;
    this.timestamp = timestamp;
  }

  private static withLocation(message: string, context: ExceptionContext): string {
    const hints: string[] = [];
    if (typeof context.token_index === 'number') {
      hints.push(`Token: ${context.token_index}`);
    }
    if (typeof context.position === 'number') {
      hints.push(`Position: ${context.position}`);
    }
    return hints.length > 0 ? `${message} [${hints.join(', ')}]` : message;
  }
}
