import type { RuleDefinition } from "@log-categorizer/shared";

/**
 * Default error patterns for session-manager and tunnel logs.
 * Matching is case-sensitive, so alternate capitalizations are spelled out.
 */
export const BUILT_IN_RULES: readonly RuleDefinition[] = [
  {
    label: "NetworkError",
    matcher: { type: "regex", pattern: String.raw`nsUtils.*err:\s*5|[Nn]etwork\s+list.*err:\s*5` },
    severity: "High",
  },
  {
    label: "TunnelError",
    matcher: { type: "regex", pattern: String.raw`CTunnelMgr.*No tunnel found|[Tt]unnel.*not\s+found` },
    severity: "High",
  },
  {
    label: "Proxy403",
    matcher: { type: "regex", pattern: String.raw`HTTP\s+response\s+code:\s*403|[Ff]orbidden` },
    severity: "Medium",
  },
  {
    label: "RecordingCorrupted",
    matcher: {
      type: "regex",
      pattern: String.raw`[Cc]orrupted\s+recording|Failed to finalize record|Recovery process failed to recover`,
    },
    severity: "High",
  },
  {
    label: "PSM_DuplicateSession",
    matcher: {
      type: "regex",
      pattern: String.raw`Duplicated session was (created|deleted)|Session UUID.*was unregistered`,
    },
    severity: "Medium",
  },
  {
    label: "PSM_VaultIssues",
    matcher: {
      type: "regex",
      pattern: String.raw`Attempting to delete the Vault user session|Vault session .* does not exist|Open vault file operation (success|fail)`,
    },
    severity: "Medium",
  },
  {
    label: "PSM_ListenerLogoff",
    matcher: { type: "regex", pattern: String.raw`PSM listener.*logoff|TSSession logoff event` },
    severity: "Low",
  },
  {
    label: "PSM_InternalConn",
    matcher: {
      type: "regex",
      pattern: String.raw`InternalConnectionClient.*(has stopped|Terminating session process)`,
    },
    severity: "Low",
  },
  {
    label: "Auth_TicketMissing",
    matcher: {
      type: "regex",
      pattern: String.raw`Ticket ID was not found|Failed to find session identifiers|session LUID was not found`,
    },
    severity: "High",
  },
];
