import { ProcessorEnvironment } from '../../config/processor-config.type';

export interface ConfigurationProviderPort {
  /**
   * Supplies raw processor settings. Validation happens in the resolver.
   */
  load(): ProcessorEnvironment;
}
