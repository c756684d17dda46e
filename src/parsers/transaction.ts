import type { ActionResult, TransactionResult } from "../types";
import {
  attribute,
  collectNodesByLocalName,
  getNodeByLocalName,
  localName,
  parseXml,
  valueText,
  type XmlNode
} from "./helpers";

export function parseTransactionResult(payload: unknown): TransactionResult {
  if (typeof payload !== "string") {
    return {
      insertResults: [],
      updateResults: [],
      replaceResults: [],
      raw: payload
    };
  }

  const parsed = parseXml(payload);
  const txNode = getNodeByLocalName(parsed, "TransactionResponse");

  if (!txNode) {
    return {
      insertResults: [],
      updateResults: [],
      replaceResults: [],
      raw: parsed
    };
  }

  const summaryNode = getNodeByLocalName(txNode, "TransactionSummary");

  return {
    totalInserted: toNumber(childText(summaryNode, "totalInserted")),
    totalUpdated: toNumber(childText(summaryNode, "totalUpdated")),
    totalReplaced: toNumber(childText(summaryNode, "totalReplaced")),
    totalDeleted: toNumber(childText(summaryNode, "totalDeleted")),
    insertResults: parseActionResults(txNode, "InsertResults"),
    updateResults: parseActionResults(txNode, "UpdateResults"),
    replaceResults: parseActionResults(txNode, "ReplaceResults"),
    raw: parsed
  };
}

function parseActionResults(
  txNode: XmlNode,
  localResultName: "InsertResults" | "UpdateResults" | "ReplaceResults"
): ActionResult[] {
  const node = getNodeByLocalName(txNode, localResultName);
  if (!node) {
    return [];
  }

  return collectNodesByLocalName(node, "Feature").map((featureNode) => ({
    handle: attribute(featureNode, "handle"),
    resourceIds: collectNodesByLocalName(featureNode, "ResourceId")
      .map((resourceIdNode) => attribute(resourceIdNode, "rid"))
      .filter((value): value is string => !!value)
  }));
}

function childText(node: XmlNode | undefined, name: string): string | undefined {
  if (!node) {
    return undefined;
  }

  const key = Object.keys(node).find((candidate) => localName(candidate) === name);
  return key === undefined ? undefined : valueText(node[key]);
}

function toNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const num = Number(value);
  return Number.isFinite(num) ? num : undefined;
}
