/**
 * UCP Well-Known Profile
 *
 * Builds the document served at /.well-known/ucp for capability discovery.
 *
 * UCP Namespace Rules:
 * - The `spec` and `schema` fields are REQUIRED for all capabilities
 * - Their origin MUST match the namespace authority (`dev.ucp.*` → https://ucp.dev)
 */

import type { PaymentHandlerConfig, ShopConfig } from "../types/config";
import { CHECKOUT_CAPABILITY, ORDER_CAPABILITY } from "../types/ucp";

/** MCP transport version advertised for the tool endpoint */
export const MCP_TRANSPORT_VERSION = "2025-11-25";

const SPEC_AUTHORITY = "https://ucp.dev";

interface CapabilityDeclaration {
  version: string;
  spec: string;
  schema: string;
  extends?: string;
}

export interface DiscoveryProfile {
  ucp: {
    version: string;
    services: Record<
      string,
      Array<{ version: string; spec: string; transport: "rest" | "mcp"; endpoint: string }>
    >;
    capabilities: Record<string, CapabilityDeclaration[]>;
  };
  payment_handlers: Record<string, PaymentHandlerConfig[]>;
}

function capability(version: string, name: string, extendsName?: string): CapabilityDeclaration {
  return {
    version,
    spec: `${SPEC_AUTHORITY}/specification/${name}`,
    schema: `${SPEC_AUTHORITY}/schemas/shopping/${name}.json`,
    ...(extendsName ? { extends: extendsName } : {}),
  };
}

export function buildDiscoveryProfile(config: Pick<ShopConfig, "ucp" | "baseUrl">): DiscoveryProfile {
  const version = config.ucp.version;
  return {
    ucp: {
      version,
      services: {
        "dev.ucp.shopping": [
          {
            version,
            spec: `${SPEC_AUTHORITY}/specification/reference`,
            transport: "rest",
            endpoint: config.baseUrl,
          },
          {
            version: MCP_TRANSPORT_VERSION,
            spec: `${SPEC_AUTHORITY}/specification/reference`,
            transport: "mcp",
            endpoint: `${config.baseUrl}/api/mcp`,
          },
        ],
      },
      capabilities: {
        [CHECKOUT_CAPABILITY]: [capability(version, "checkout")],
        [ORDER_CAPABILITY]: [capability(version, "order")],
        "dev.ucp.shopping.fulfillment": [capability(version, "fulfillment", CHECKOUT_CAPABILITY)],
        "dev.ucp.shopping.discount": [capability(version, "discount", CHECKOUT_CAPABILITY)],
      },
    },
    payment_handlers: config.ucp.paymentHandlers,
  };
}
