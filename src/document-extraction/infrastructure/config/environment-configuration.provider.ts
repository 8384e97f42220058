import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigurationProviderPort } from '../../domain/ports/configuration-provider.port';
import { ProcessorEnvironment } from '../../config/processor-config.type';

/**
 * Reads processor settings from the process environment.
 *
 * ConfigModule copies keys from an optional local .env file into the
 * environment beforehand, skipping keys that are already set.
 */
@Injectable()
export class EnvironmentConfigurationProvider
  implements ConfigurationProviderPort
{
  constructor(
    private readonly configService: ConfigService<ProcessorEnvironment>,
  ) {}

  load(): ProcessorEnvironment {
    return {
      GOOGLE_APPLICATION_CREDENTIALS: this.configService.get(
        'GOOGLE_APPLICATION_CREDENTIALS',
        { infer: true },
      ),
      PROJECT_ID: this.configService.get('PROJECT_ID', { infer: true }),
      LOCATION: this.configService.get('LOCATION', { infer: true }),
      PROCESSOR_ID: this.configService.get('PROCESSOR_ID', { infer: true }),
      PROCESSOR_VERSION: this.configService.get('PROCESSOR_VERSION', {
        infer: true,
      }),
    };
  }
}
