import { Injectable } from '@nestjs/common';
import { DocumentProcessorServiceClient } from '@google-cloud/documentai';
import { ProcessorConfiguration } from '../../config/processor-config.type';

export type DocumentAiClient = Pick<
  DocumentProcessorServiceClient,
  'processorVersionPath' | 'processDocument' | 'close'
>;

export function documentAiEndpoint(location: string): string {
  return `${location}-documentai.googleapis.com`;
}

/**
 * Builds Document AI clients bound to the regional endpoint of the
 * configured location, authenticated with the configured key file.
 */
@Injectable()
export class DocumentAiClientFactory {
  create(configuration: ProcessorConfiguration): DocumentAiClient {
    return new DocumentProcessorServiceClient({
      apiEndpoint: documentAiEndpoint(configuration.location),
      keyFilename: configuration.credentialsPath,
      projectId: configuration.projectId,
    });
  }
}
