/**
 * TypeBox schemas for the files the client reads at startup.
 */

import { Type, type Static, type TProperties, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

// ---------------------------------------------------------------------------
// Addressing file (addr_list.json)
// ---------------------------------------------------------------------------

export const AddressBookSchema = Type.Object(
  {
    HttpProvider: Type.String({ minLength: 1, description: "Ledger node JSON-RPC URL." }),
    EvidenceChainOfCustody: Type.String({ minLength: 1, description: "Contract address." }),
    DemoUser: Type.String({ minLength: 1, description: "Account the client sends from." }),
    AnotherUser: Type.Optional(
      Type.String({ description: "Second account, default transfer recipient." }),
    ),
  },
  { additionalProperties: true },
);

export type AddressBook = Static<typeof AddressBookSchema>;

// ---------------------------------------------------------------------------
// Contract descriptor (build artifact)
// ---------------------------------------------------------------------------

const AbiParameterSchema = Type.Recursive(
  (This) =>
    Type.Object(
      {
        name: Type.Optional(Type.String()),
        type: Type.String({ minLength: 1 }),
        components: Type.Optional(Type.Array(This)),
      },
      { additionalProperties: true },
    ),
  { $id: "AbiParameter" },
);

const AbiItemSchema = Type.Object(
  {
    type: Type.String(),
    name: Type.Optional(Type.String()),
    inputs: Type.Optional(Type.Array(AbiParameterSchema)),
    outputs: Type.Optional(Type.Array(AbiParameterSchema)),
    stateMutability: Type.Optional(Type.String()),
  },
  { additionalProperties: true },
);

export const ContractDescriptorSchema = Type.Object(
  {
    contractName: Type.Optional(Type.String()),
    abi: Type.Array(AbiItemSchema),
  },
  { additionalProperties: true },
);

export type ContractDescriptor = Static<typeof ContractDescriptorSchema>;

// ---------------------------------------------------------------------------
// Tuning config (custody.config.json)
// ---------------------------------------------------------------------------

const PositiveInt = (description: string) => Type.Integer({ minimum: 1, description });
const NonNegativeInt = (description: string) => Type.Integer({ minimum: 0, description });

const Section = <T extends TProperties>(properties: T) =>
  Type.Optional(Type.Object(properties, { additionalProperties: false }));

export const ConfigFileSchema = Type.Object(
  {
    paths: Section({
      addressBook: Type.Optional(Type.String({ minLength: 1 })),
      contractDescriptor: Type.Optional(Type.String({ minLength: 1 })),
    }),
    chain: Section({
      chainId: Type.Optional(PositiveInt("Chain id asserted when signing.")),
      name: Type.Optional(Type.String({ minLength: 1 })),
      symbol: Type.Optional(Type.String({ minLength: 1 })),
      decimals: Type.Optional(Type.Integer({ minimum: 0, maximum: 36 })),
    }),
    ledger: Section({
      confirmations: Type.Optional(PositiveInt("Blocks on top of the inclusion block.")),
      confirmationTimeoutMs: Type.Optional(PositiveInt("Receipt wait timeout.")),
      pollingIntervalMs: Type.Optional(PositiveInt("Receipt polling interval.")),
      rpcTimeoutMs: Type.Optional(PositiveInt("Per-request RPC timeout.")),
      readRetries: Type.Optional(NonNegativeInt("Retries for read calls.")),
    }),
    signer: Section({
      mode: Type.Optional(Type.Union([Type.Literal("node"), Type.Literal("private-key")])),
      keyFile: Type.Optional(Type.String({ minLength: 1 })),
    }),
    storage: Section({
      provider: Type.Optional(Type.Union([Type.Literal("kubo"), Type.Literal("pinata")])),
      apiUrl: Type.Optional(Type.String({ minLength: 1 })),
      gateway: Type.Optional(Type.String({ minLength: 1 })),
      pinataJwt: Type.Optional(Type.String()),
      timeoutMs: Type.Optional(PositiveInt("Upload timeout.")),
    }),
  },
  { additionalProperties: false },
);

export type ConfigFile = Static<typeof ConfigFileSchema>;

/**
 * First validation problem as "path: message", or null when the value conforms.
 */
export function firstSchemaIssue(schema: TSchema, value: unknown): string | null {
  const issue = Value.Errors(schema, value).First();
  if (!issue) return null;
  return `${issue.path || "<root>"}: ${issue.message}`;
}
