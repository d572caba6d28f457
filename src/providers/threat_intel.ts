import type { ThreatIntelProvider, ThreatIntelResponse } from "../contracts/collaborators";

/**
 * Offline threat feed. Returns two canned advisories keyed on the query.
 */
export class StubThreatIntelProvider implements ThreatIntelProvider {
  async fetch(query: string): Promise<ThreatIntelResponse> {
    const topic = query.trim().slice(0, 60);
    return {
      status: "success",
      items: [
        {
          id: "threat-advisory-1",
          title: `Security advisory: ${topic}`,
          content: `Recent analysis flagged activity related to ${topic}. Review exposure and apply vendor patches.`,
          source: "stub-threat-feed",
        },
        {
          id: "threat-advisory-2",
          title: `Vulnerability disclosure: ${topic}`,
          content: `A new disclosure affects systems related to ${topic}. Check affected versions.`,
          source: "stub-cve-feed",
        },
      ],
    };
  }
}
