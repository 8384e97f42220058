import { ConfigurationProviderPort } from '../../domain/ports/configuration-provider.port';
import { ProcessorEnvironment } from '../../config/processor-config.type';

/**
 * Settings fixed in code, for builds that ship their processor identity
 * and credentials path instead of reading them from the environment.
 *
 * Usage:
 * ```typescript
 * DocumentExtractionModule.register({
 *   configurationProvider: new InlineConfigurationProvider({
 *     GOOGLE_APPLICATION_CREDENTIALS: '/etc/keys/docai.json',
 *     PROJECT_ID: 'my-project',
 *     PROCESSOR_ID: 'abc123',
 *   }),
 * });
 * ```
 */
export class InlineConfigurationProvider implements ConfigurationProviderPort {
  private readonly settings: ProcessorEnvironment;

  constructor(settings: ProcessorEnvironment) {
    this.settings = { ...settings };
  }

  load(): ProcessorEnvironment {
    return { ...this.settings };
  }
}
