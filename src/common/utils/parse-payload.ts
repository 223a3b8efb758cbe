import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { GraphError } from '../errors/graph-error';

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {});
    return [...own, ...flattenErrors(error.children ?? [], path)].map((msg) =>
      msg.startsWith(path) ? msg : `${path}: ${msg}`,
    );
  });
}

/**
 * Turns an untrusted message body into a validated DTO instance.
 * Throws ValidationFailed listing every broken constraint.
 */
export async function parsePayload<T extends object>(
  cls: ClassConstructor<T>,
  body: unknown,
): Promise<T> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new GraphError('ValidationFailed', 'Payload must be an object');
  }
  const instance = plainToInstance(cls, body);
  const errors = await validate(instance, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });
  if (errors.length > 0) {
    throw new GraphError('ValidationFailed', flattenErrors(errors).join('; '));
  }
  return instance;
}
