import type { OwsException } from "../errors";
import {
  attribute,
  collectNodesByLocalName,
  collectTextValuesByLocalName,
  parseXml
} from "./helpers";

export function isLikelyOwsExceptionPayload(payload: unknown): boolean {
  return (
    typeof payload === "string" &&
    (payload.includes("ExceptionReport") || payload.includes("exceptionCode"))
  );
}

export function parseOwsExceptionPayload(payload: unknown): OwsException[] {
  if (!isLikelyOwsExceptionPayload(payload) || typeof payload !== "string") {
    return [];
  }

  const nodes = collectNodesByLocalName(parseXml(payload), "Exception");

  return nodes.map((node) => ({
    exceptionCode: attribute(node, "exceptionCode") ?? attribute(node, "code"),
    locator: attribute(node, "locator"),
    text: collectTextValuesByLocalName(node, "ExceptionText").join("\n") || "Unknown OWS exception"
  }));
}
