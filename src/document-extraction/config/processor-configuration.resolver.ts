import { Inject, Injectable, Logger } from '@nestjs/common';
import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { existsSync } from 'fs';
import {
  ProcessorConfiguration,
  ProcessorEnvironment,
} from './processor-config.type';
import { ConfigurationProviderPort } from '../domain/ports/configuration-provider.port';
import { ConfigurationError } from '../../utils/errors/configuration.error';
import validateConfig from '../../utils/validate-config';

export const DEFAULT_LOCATION = 'eu';
export const DEFAULT_PROCESSOR_VERSION = 'rc';

const required = (key: string) => ({
  message: `Missing required setting: ${key}`,
});

// Required keys are declared first, in the order they are reported
class EnvironmentVariablesValidator {
  @IsString(required('GOOGLE_APPLICATION_CREDENTIALS'))
  @IsNotEmpty(required('GOOGLE_APPLICATION_CREDENTIALS'))
  GOOGLE_APPLICATION_CREDENTIALS!: string;

  @IsString(required('PROJECT_ID'))
  @IsNotEmpty(required('PROJECT_ID'))
  PROJECT_ID!: string;

  @IsString(required('PROCESSOR_ID'))
  @IsNotEmpty(required('PROCESSOR_ID'))
  PROCESSOR_ID!: string;

  @IsString()
  @IsOptional()
  LOCATION?: string;

  @IsString()
  @IsOptional()
  PROCESSOR_VERSION?: string;
}

/**
 * Turns raw provider settings into a validated ProcessorConfiguration.
 *
 * Fails on the first missing required key, then checks that the
 * credentials file exists. Nothing is written back to the environment;
 * the credentials path travels with the configuration to the client.
 */
@Injectable()
export class ProcessorConfigurationResolver {
  private readonly logger = new Logger(ProcessorConfigurationResolver.name);

  constructor(
    @Inject('ConfigurationProviderPort')
    private readonly configurationProvider: ConfigurationProviderPort,
  ) {}

  resolve(): ProcessorConfiguration {
    const settings: ProcessorEnvironment = this.configurationProvider.load();
    const validated = validateConfig(settings, EnvironmentVariablesValidator);

    const credentialsPath = validated.GOOGLE_APPLICATION_CREDENTIALS;
    if (!existsSync(credentialsPath)) {
      throw ConfigurationError.fileNotFound(
        'GOOGLE_APPLICATION_CREDENTIALS',
        credentialsPath,
      );
    }

    const configuration: ProcessorConfiguration = Object.freeze({
      credentialsPath,
      projectId: validated.PROJECT_ID,
      location: validated.LOCATION || DEFAULT_LOCATION,
      processorId: validated.PROCESSOR_ID,
      processorVersion: validated.PROCESSOR_VERSION || DEFAULT_PROCESSOR_VERSION,
    });

    this.logger.debug(
      `Resolved processor ${configuration.processorId} (${configuration.processorVersion}) in ${configuration.projectId}/${configuration.location}`,
    );

    return configuration;
  }
}
