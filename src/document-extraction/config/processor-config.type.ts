/**
 * Raw processor settings as a configuration provider supplies them,
 * keyed by environment variable name.
 */
export type ProcessorEnvironment = {
  GOOGLE_APPLICATION_CREDENTIALS?: string;
  PROJECT_ID?: string;
  LOCATION?: string;
  PROCESSOR_ID?: string;
  PROCESSOR_VERSION?: string;
};

export type ProcessorConfiguration = Readonly<{
  credentialsPath: string;
  projectId: string;
  location: string; // e.g. 'eu', 'us'
  processorId: string;
  processorVersion: string; // e.g. 'rc', 'stable' or a version id
}>;
