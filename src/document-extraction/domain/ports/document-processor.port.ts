import { ProcessorConfiguration } from '../../config/processor-config.type';
import { DocumentRequest } from '../entities/document-request.entity';
import { DocumentResult } from '../entities/document-result.entity';

export interface DocumentProcessorPort {
  /**
   * Send a local file to the configured processor version
   * @throws whatever the remote call or file read raised, unmodified
   */
  process(
    configuration: ProcessorConfiguration,
    request: DocumentRequest,
  ): Promise<DocumentResult>;
}
