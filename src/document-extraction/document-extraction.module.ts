import { DynamicModule, Module, Provider } from '@nestjs/common';
import { DocumentExtractionService } from './document-extraction.service';
import { ProcessorConfigurationResolver } from './config/processor-configuration.resolver';
import { ConfigurationProviderPort } from './domain/ports/configuration-provider.port';
import { EnvironmentConfigurationProvider } from './infrastructure/config/environment-configuration.provider';
import { GcpDocumentAiAdapter } from './infrastructure/ocr/gcp-document-ai.adapter';
import { DocumentAiClientFactory } from './infrastructure/ocr/document-ai-client.factory';
import { NativeFilePickerAdapter } from './infrastructure/file-picker/native-file-picker.adapter';
import { DialogProcessRunner } from './infrastructure/file-picker/dialog-process.runner';
import { ConsoleOutputAdapter } from './infrastructure/output/console-output.adapter';

export interface DocumentExtractionModuleOptions {
  /**
   * Source of processor settings. Defaults to the environment (and .env).
   */
  configurationProvider?: ConfigurationProviderPort;
}

@Module({})
export class DocumentExtractionModule {
  static register(
    options: DocumentExtractionModuleOptions = {},
  ): DynamicModule {
    const configurationProvider: Provider = options.configurationProvider
      ? {
          provide: 'ConfigurationProviderPort',
          useValue: options.configurationProvider,
        }
      : {
          provide: 'ConfigurationProviderPort',
          useClass: EnvironmentConfigurationProvider,
        };

    return {
      module: DocumentExtractionModule,
      providers: [
        // Application layer
        DocumentExtractionService,
        ProcessorConfigurationResolver,

        // Infrastructure adapters (Hexagonal Architecture)
        configurationProvider,
        {
          provide: 'DocumentProcessorPort',
          useClass: GcpDocumentAiAdapter,
        },
        {
          provide: 'FilePickerPort',
          useClass: NativeFilePickerAdapter,
        },
        {
          provide: 'OutputPort',
          useClass: ConsoleOutputAdapter,
        },

        DocumentAiClientFactory,
        DialogProcessRunner,
      ],
      exports: [DocumentExtractionService],
    };
  }
}
