import { Inject, Injectable, Logger } from '@nestjs/common';
import { basename } from 'path';
import { ProcessorConfigurationResolver } from './config/processor-configuration.resolver';
import { ProcessorConfiguration } from './config/processor-config.type';
import { DocumentProcessorPort } from './domain/ports/document-processor.port';
import { FilePickerPort } from './domain/ports/file-picker.port';
import { OutputPort } from './domain/ports/output.port';
import { createDocumentRequest } from './domain/entities/document-request.entity';
import { ExtractionOutcome } from './domain/enums/extraction-outcome.enum';
import { ConfigurationError } from '../utils/errors/configuration.error';
import { FilePickerError } from '../utils/errors/file-picker.error';
import { resolveMimeType } from './utils/mime-type.resolver';
import { selectText } from './utils/text-extraction.selector';
import {
  describeProcessingFailure,
  errorMessage,
} from './utils/processing-error.util';

/**
 * Document Extraction Service
 *
 * One run: validate configuration, let the user pick a file, send it to
 * Document AI and print the best available text. Every failure is reported
 * on standard output and ends the run; nothing is retried.
 */
@Injectable()
export class DocumentExtractionService {
  private readonly logger = new Logger(DocumentExtractionService.name);

  constructor(
    private readonly configurationResolver: ProcessorConfigurationResolver,
    @Inject('FilePickerPort')
    private readonly filePicker: FilePickerPort,
    @Inject('DocumentProcessorPort')
    private readonly documentProcessor: DocumentProcessorPort,
    @Inject('OutputPort')
    private readonly output: OutputPort,
  ) {}

  async run(): Promise<ExtractionOutcome> {
    let configuration: ProcessorConfiguration;
    try {
      configuration = this.configurationResolver.resolve();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.warn(`Configuration rejected: ${JSON.stringify(error)}`);
        this.output.print(`Configuration error: ${error.message}`);
        return ExtractionOutcome.CONFIGURATION_INVALID;
      }
      throw error;
    }

    let filePath: string | null;
    try {
      filePath = await this.filePicker.pickFile();
    } catch (error) {
      this.logger.error(
        `File dialog failed: ${
          error instanceof FilePickerError
            ? JSON.stringify(error)
            : errorMessage(error)
        }`,
      );
      this.output.print(`Could not open file dialog: ${errorMessage(error)}`);
      return ExtractionOutcome.FILE_PICKER_FAILED;
    }

    if (!filePath) {
      this.output.print('No file selected.');
      return ExtractionOutcome.NO_FILE_SELECTED;
    }

    const mimeType = resolveMimeType(filePath);
    this.logger.log(`Processing ${basename(filePath)} as ${mimeType}`);

    try {
      const result = await this.documentProcessor.process(
        configuration,
        createDocumentRequest(filePath, mimeType),
      );
      const selection = selectText(result);

      this.logger.log(
        `Extracted ${selection.text.length} characters (source: ${selection.source}, pages: ${result.pageCount})`,
      );
      this.output.print(selection.text);

      return ExtractionOutcome.COMPLETED;
    } catch (error) {
      const hint = describeProcessingFailure(error);
      if (hint) {
        this.logger.warn(hint);
      }

      this.output.print(`Error processing document: ${errorMessage(error)}`);
      return ExtractionOutcome.PROCESSING_FAILED;
    }
  }
}
