import {
  DocumentAiClientFactory,
  documentAiEndpoint,
} from './document-ai-client.factory';
import { ProcessorConfiguration } from '../../config/processor-config.type';

describe('DocumentAiClientFactory', () => {
  const configuration: ProcessorConfiguration = {
    credentialsPath: '/keys/test-credentials.json',
    projectId: 'test-project',
    location: 'eu',
    processorId: 'test-processor',
    processorVersion: 'rc',
  };

  describe('documentAiEndpoint', () => {
    it('should derive the regional endpoint from the location', () => {
      expect(documentAiEndpoint('eu')).toBe('eu-documentai.googleapis.com');
      expect(documentAiEndpoint('us')).toBe('us-documentai.googleapis.com');
    });
  });

  describe('create', () => {
    it('should build processor version resource names', async () => {
      const client = new DocumentAiClientFactory().create(configuration);

      expect(
        client.processorVersionPath('test-project', 'eu', 'test-processor', 'rc'),
      ).toBe(
        'projects/test-project/locations/eu/processors/test-processor/processorVersions/rc',
      );

      await client.close();
    });
  });
});
