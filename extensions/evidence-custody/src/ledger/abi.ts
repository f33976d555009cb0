/**
 * EvidenceChainOfCustody contract ABI (the functions this client calls).
 */

export const EVIDENCE_CUSTODY_ABI = [
  {
    type: "function",
    name: "registerEvidence",
    stateMutability: "nonpayable",
    inputs: [
      { name: "caseId", type: "string" },
      { name: "evidenceId", type: "string" },
      { name: "holderName", type: "string" },
      { name: "description", type: "string" },
      { name: "ipfsHash", type: "string" },
      { name: "action", type: "string" },
    ],
    outputs: [],
  },
  {
    type: "function",
    name: "transferEvidence",
    stateMutability: "nonpayable",
    inputs: [
      { name: "caseId", type: "string" },
      { name: "evidenceId", type: "string" },
      { name: "newHolder", type: "address" },
      { name: "newHolderName", type: "string" },
      { name: "action", type: "string" },
      { name: "description", type: "string" },
    ],
    outputs: [],
  },
  {
    type: "function",
    name: "deleteEvidence",
    stateMutability: "nonpayable",
    inputs: [
      { name: "caseId", type: "string" },
      { name: "evidenceId", type: "string" },
    ],
    outputs: [],
  },
  {
    type: "function",
    name: "grantAccess",
    stateMutability: "nonpayable",
    inputs: [
      { name: "caseId", type: "string" },
      { name: "evidenceId", type: "string" },
      { name: "user", type: "address" },
    ],
    outputs: [],
  },
  {
    type: "function",
    name: "revokeAccess",
    stateMutability: "nonpayable",
    inputs: [
      { name: "caseId", type: "string" },
      { name: "evidenceId", type: "string" },
      { name: "user", type: "address" },
    ],
    outputs: [],
  },
  {
    type: "function",
    name: "viewEvidence",
    stateMutability: "view",
    inputs: [
      { name: "caseId", type: "string" },
      { name: "evidenceId", type: "string" },
    ],
    outputs: [
      { name: "evidenceId", type: "string" },
      { name: "caseId", type: "string" },
      { name: "currentHolder", type: "address" },
      { name: "holderName", type: "string" },
      { name: "description", type: "string" },
      { name: "ipfsHash", type: "string" },
      { name: "isDeleted", type: "bool" },
    ],
  },
  {
    type: "function",
    name: "getHistory",
    stateMutability: "view",
    inputs: [
      { name: "caseId", type: "string" },
      { name: "evidenceId", type: "string" },
    ],
    outputs: [
      {
        name: "",
        type: "tuple[]",
        components: [
          { name: "holder", type: "address" },
          { name: "holderName", type: "string" },
          { name: "action", type: "string" },
          { name: "description", type: "string" },
          { name: "timestamp", type: "uint256" },
        ],
      },
    ],
  },
  {
    type: "function",
    name: "getAllEvidenceIds",
    stateMutability: "view",
    inputs: [],
    outputs: [{ name: "", type: "string[]" }],
  },
] as const;

export type AbiParameterShape = {
  readonly type: string;
  readonly components?: readonly AbiParameterShape[];
};

/** Canonical type of a parameter: tuples expand to "(t1,t2)" with their array suffix. */
function canonicalType(param: AbiParameterShape): string {
  if (param.type.startsWith("tuple") && param.components) {
    const suffix = param.type.slice("tuple".length);
    return `(${param.components.map(canonicalType).join(",")})${suffix}`;
  }
  return param.type;
}

/** "transferEvidence(string,string,address,string,string,string)" */
export function functionSignature(fn: {
  readonly name: string;
  readonly inputs?: readonly AbiParameterShape[];
}): string {
  return `${fn.name}(${(fn.inputs ?? []).map(canonicalType).join(",")})`;
}

/** Signatures a contract descriptor must expose for this client to work. */
export const REQUIRED_FUNCTION_SIGNATURES: readonly string[] =
  EVIDENCE_CUSTODY_ABI.map(functionSignature);
