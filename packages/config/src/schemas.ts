import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const withId = <T extends object>(schema: T, id: string) => ({ ...schema, $id: id });

const Ipv4Schema = z.string().ip({ version: 'v4' });

// 224.0.0.0/4
const isMulticastAddress = (host: string): boolean => {
  const first = Number(host.split('.')[0]);
  return first >= 224 && first <= 239;
};

export const EndpointSchema = z.object({
  host: Ipv4Schema,
  port: z.number().int().min(0).max(65535),
});
export type Endpoint = z.infer<typeof EndpointSchema>;

export const MulticastGroupSchema = EndpointSchema.refine((endpoint) => isMulticastAddress(endpoint.host), {
  message: 'Multicast group must be an address in 224.0.0.0/4',
  path: ['host'],
});

export const RemoteExecutionConfigSchema = z.object({
  bufferSize: z.number().int().positive(),
  multicastGroup: MulticastGroupSchema,
  multicastBindAddress: Ipv4Schema,
  multicastTtl: z.number().int().min(0).max(255),
  localId: z.string().uuid(),
  commandAddress: EndpointSchema,
  /** Only a peer reporting this project name is accepted during discovery */
  targetName: z.string().min(1).optional(),
});
export type RemoteExecutionConfig = Readonly<z.infer<typeof RemoteExecutionConfigSchema>>;

const IniValueSchema = z.union([z.string(), z.boolean()]);
const IniIntegerSchema = z.string().regex(/^\d+$/, 'Expected a non-negative integer');

/**
 * Remote execution keys of the engine settings section. Values come straight
 * from the ini parser, so numbers are still strings.
 */
export const ProjectSettingsSchema = z
  .object({
    bRemoteExecution: IniValueSchema.optional(),
    RemoteExecutionMulticastGroupEndpoint: z.string().optional(),
    RemoteExecutionMulticastBindAddress: z.string().optional(),
    RemoteExecutionMulticastTtl: IniIntegerSchema.optional(),
    RemoteExecutionReceiveBufferSizeBytes: IniIntegerSchema.optional(),
  })
  .passthrough();
export type ProjectSettings = z.infer<typeof ProjectSettingsSchema>;

export const jsonSchemas = {
  remoteExecution: withId(
    zodToJsonSchema(RemoteExecutionConfigSchema, { target: 'jsonSchema7' }),
    'RemoteExecutionConfig'
  ),
  projectSettings: withId(
    zodToJsonSchema(ProjectSettingsSchema, { target: 'jsonSchema7' }),
    'RemoteExecutionProjectSettings'
  ),
};
