import { Injectable, Logger } from '@nestjs/common';
import { protos } from '@google-cloud/documentai';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { DocumentProcessorPort } from '../../domain/ports/document-processor.port';
import { DocumentRequest } from '../../domain/entities/document-request.entity';
import { DocumentResult } from '../../domain/entities/document-result.entity';
import { ProcessorConfiguration } from '../../config/processor-config.type';
import {
  DocumentAiClientFactory,
  documentAiEndpoint,
} from './document-ai-client.factory';
import { DocumentResultMapper } from './mappers/document-result.mapper';
import { errorMessage } from '../../utils/processing-error.util';

type ProcessRequest = protos.google.cloud.documentai.v1.IProcessRequest;

/**
 * GCP Document AI Adapter
 *
 * Online (synchronous) processing of a local file against a specific
 * processor version. The file is sent inline as a raw document together
 * with a layout chunking configuration, so layout-parser processors return
 * a chunked document alongside the flat text.
 *
 * IAM Requirements:
 * - Service account needs: roles/documentai.apiUser
 *
 * Errors from the file read or the remote call are rethrown unchanged.
 */
@Injectable()
export class GcpDocumentAiAdapter implements DocumentProcessorPort {
  private readonly logger = new Logger(GcpDocumentAiAdapter.name);

  constructor(private readonly clientFactory: DocumentAiClientFactory) {}

  async process(
    configuration: ProcessorConfiguration,
    request: DocumentRequest,
  ): Promise<DocumentResult> {
    const client = this.clientFactory.create(configuration);
    let result: DocumentResult;

    try {
      const name = client.processorVersionPath(
        configuration.projectId,
        configuration.location,
        configuration.processorId,
        configuration.processorVersion,
      );

      const content = await readFile(request.filePath);

      this.logger.log(
        `Sending ${basename(request.filePath)} (${content.length} bytes, ${request.mimeType}) to ${documentAiEndpoint(configuration.location)}`,
      );
      this.logger.debug(`Processor version: ${name}`);

      const processRequest: ProcessRequest = {
        name,
        rawDocument: {
          content,
          mimeType: request.mimeType,
        },
        processOptions: {
          layoutConfig: {
            chunkingConfig: {
              chunkSize: request.chunkSize,
              includeAncestorHeadings: request.includeAncestorHeadings,
            },
          },
        },
      };

      const [response] = await client.processDocument(processRequest);
      result = DocumentResultMapper.toDomain(response.document);

      this.logger.debug(
        `[GCP DOCUMENT AI] Result structure: ${JSON.stringify({
          hasText: !!result.text,
          textLength: result.text?.length ?? 0,
          chunkCount: result.chunkedDocument?.chunks.length ?? 0,
          blockCount: result.documentLayout?.blocks.length ?? 0,
          pageCount: result.pageCount,
        })}`,
      );
    } catch (error) {
      // The original failure is what the caller reports
      await client.close().catch((closeError: unknown) => {
        this.logger.warn(
          `Failed to close Document AI client: ${errorMessage(closeError)}`,
        );
      });
      throw error;
    }

    await client.close();
    return result;
  }
}
