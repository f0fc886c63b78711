import { PipeTransform } from '@nestjs/common';
import { z, ZodTypeAny } from 'zod';
import { InvalidCommandException } from '../exceptions/broker.exceptions';

export class ZodValidationPipe<T extends ZodTypeAny>
  implements PipeTransform<unknown, z.output<T>>
{
  constructor(private readonly schema: T) {}

  transform(value: unknown): z.output<T> {
    const parsed = this.schema.safeParse(value);
    if (!parsed.success) {
      throw new InvalidCommandException('Malformed request', {
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
        ),
      });
    }
    return parsed.data;
  }
}
