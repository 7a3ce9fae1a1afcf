import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { responseFormatter } from '../../server/responseFormatter.js';
import type { CollaboratorAddresses, StoredReportLookup } from './types.js';

/**
 * Wrap a report or acknowledgement as a JSON text result. Amounts and
 * timestamps are bigint and serialize as decimal strings.
 */
export function buildJsonResponse(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: responseFormatter.format(payload),
      },
    ],
  };
}

/**
 * Stored reports are answered with an explicit `found` flag; an absent entry
 * carries `report: null`, never a zero-filled report.
 */
export function buildStoredReportResponse(lookup: StoredReportLookup): CallToolResult {
  return buildJsonResponse({
    found: lookup.found,
    owner: lookup.owner,
    period_key: lookup.period_key,
    report: lookup.found ? lookup.report : null,
  });
}

export function buildAddressesResponse(addresses: CollaboratorAddresses | undefined): CallToolResult {
  return buildJsonResponse({
    configured: addresses !== undefined,
    addresses: addresses ?? null,
  });
}

export function buildAdminResponse(admin: string | undefined): CallToolResult {
  return buildJsonResponse({
    initialized: admin !== undefined,
    admin: admin ?? null,
  });
}

export function buildAcknowledgement(message: string, data: Record<string, unknown> = {}): CallToolResult {
  return buildJsonResponse({
    success: true,
    message,
    ...data,
  });
}
