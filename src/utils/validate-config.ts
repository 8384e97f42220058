import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ConfigurationError } from './errors/configuration.error';

/**
 * Validates raw settings against a class-validator decorated class.
 *
 * Properties are checked in declaration order and the first failing one is
 * reported, so callers get a single error naming the offending key.
 */
function validateConfig<T extends object>(
  config: Record<string, unknown>,
  envVariablesClass: ClassConstructor<T>,
): T {
  const validatedConfig = plainToInstance(envVariablesClass, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
    stopAtFirstError: true,
  });

  if (errors.length > 0) {
    const [firstError] = errors;
    const reason = Object.values(firstError.constraints ?? {}).join(', ');

    throw new ConfigurationError({
      key: firstError.property,
      message: reason || `${firstError.property} is invalid`,
    });
  }

  return validatedConfig;
}

export default validateConfig;
