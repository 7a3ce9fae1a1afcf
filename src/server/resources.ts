/**
 * Resources module for the reporting MCP server
 *
 * Exposes read-only views of the engine configuration and the event log.
 */

import type { ReportingEngine } from '../tools/reporting/engine.js';
import type { EventLog } from './eventLog.js';

/**
 * Response formatter interface to avoid direct dependency on concrete implementation
 */
interface ResponseFormatter {
  format(data: unknown): string;
}

export type ResourceContents = {
  contents: {
    uri: string;
    mimeType: string;
    text: string;
  }[];
};

/**
 * Resource handler function signature
 */
export type ResourceHandler = (
  uri: string,
  dependencies: ResourceDependencies,
) => Promise<ResourceContents>;

/**
 * Resource definition structure
 */
export interface ResourceDefinition {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

/**
 * Injectable dependencies for resource handlers
 */
export interface ResourceDependencies {
  engine: ReportingEngine;
  eventLog: EventLog;
  responseFormatter: ResponseFormatter;
}

function jsonContents(uri: string, text: string): ResourceContents {
  return {
    contents: [
      {
        uri,
        mimeType: 'application/json',
        text,
      },
    ],
  };
}

const defaultResourceHandlers: Record<string, ResourceHandler> = {
  'reporting://addresses': async (uri, { engine, responseFormatter }) => {
    const addresses = await engine.getAddresses();
    return jsonContents(
      uri,
      responseFormatter.format({ configured: addresses !== undefined, addresses: addresses ?? null }),
    );
  },

  'reporting://admin': async (uri, { engine, responseFormatter }) => {
    const admin = await engine.getAdmin();
    return jsonContents(
      uri,
      responseFormatter.format({ initialized: admin !== undefined, admin: admin ?? null }),
    );
  },

  'reporting://events': async (uri, { eventLog, responseFormatter }) => {
    const events = eventLog.getRecent().map((entry) => ({
      sequence: entry.sequence,
      recorded_at: entry.recorded_at.toISOString(),
      ...entry.event,
    }));
    return jsonContents(uri, responseFormatter.format({ events }));
  },
};

const defaultResourceDefinitions: ResourceDefinition[] = [
  {
    uri: 'reporting://addresses',
    name: 'Collaborator Addresses',
    description: 'Configured locations of the upstream domain services',
    mimeType: 'application/json',
  },
  {
    uri: 'reporting://admin',
    name: 'Reporting Admin',
    description: 'Identity recorded as admin at initialization',
    mimeType: 'application/json',
  },
  {
    uri: 'reporting://events',
    name: 'Reporting Events',
    description: 'Most recent committed reporting events, oldest first',
    mimeType: 'application/json',
  },
];

/**
 * ResourceManager class that handles resource registration and request handling
 */
export class ResourceManager {
  private dependencies: ResourceDependencies;
  private resourceHandlers: Record<string, ResourceHandler>;
  private resourceDefinitions: ResourceDefinition[];

  constructor(dependencies: ResourceDependencies) {
    this.dependencies = dependencies;
    this.resourceHandlers = { ...defaultResourceHandlers };
    this.resourceDefinitions = [...defaultResourceDefinitions];
  }

  registerResource(definition: ResourceDefinition, handler: ResourceHandler): void {
    this.resourceDefinitions.push(definition);
    this.resourceHandlers[definition.uri] = handler;
  }

  listResources(): { resources: ResourceDefinition[] } {
    return {
      resources: this.resourceDefinitions,
    };
  }

  async readResource(uri: string): Promise<ResourceContents> {
    const handler = this.resourceHandlers[uri];
    if (!handler) {
      throw new Error(`Unknown resource: ${uri}`);
    }

    return await handler(uri, this.dependencies);
  }
}
