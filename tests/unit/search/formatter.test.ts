/**
 * lib/search/formatter.ts — wire payload shaping
 *
 * FMT_01  normalizeScore maps the domain onto [0, 1], rounded to 4 places
 * FMT_02  hits are grouped by type, ordered by score then id, truncated
 * FMT_03  matching_tools come from the whole tool pool
 * FMT_04  agent attributes are carried through
 * FMT_05  emptyResultSet
 */
export {};

import { emptyResultSet, formatResults, normalizeScore, ScoredHit } from "@/lib/search/formatter";
import type { EntityDocument } from "@/lib/search/types";
import { doc } from "../../helpers/documents";

function hit(document: EntityDocument, score: number): ScoredHit {
  return { id: document.id, document, score, similarity: null, keywordFraction: 0 };
}

const range = { min: 0, max: 2 };

describe("formatter", () => {
  test("FMT_01: normalizeScore", () => {
    expect(normalizeScore(1, range)).toBe(0.5);
    expect(normalizeScore(2 / 3, range)).toBe(0.3333);
    expect(normalizeScore(3, range)).toBe(1);
    expect(normalizeScore(-1, range)).toBe(0);
    expect(normalizeScore(0.5, { min: 0, max: 0 })).toBe(1);
    expect(normalizeScore(0, { min: 0, max: 0 })).toBe(0);
  });

  test("FMT_02: grouping, ordering and truncation", () => {
    const result = formatResults({
      query: "q",
      hits: [
        hit(doc("/b"), 1),
        hit(doc("/a"), 1),
        hit(doc("/c"), 1.5),
        hit(doc("/c::t1", "tool", { owner: "/c" }), 0.4),
      ],
      maxResults: 2,
      scoreRange: range,
      degraded: false,
      mode: "native",
    });
    expect(result.servers.map((s) => [s.path, s.relevance_score])).toEqual([
      ["/c", 0.75],
      ["/a", 0.5],
    ]);
    expect(result.total_servers).toBe(2);
    expect(result.tools).toEqual([
      {
        name: "c::t1",
        tool_name: "c::t1",
        path: "/c::t1",
        description: "",
        tags: [],
        server_path: "/c",
        server_name: "",
        relevance_score: 0.2,
      },
    ]);
    expect(result.mode).toBe("native");
    expect(result.degraded).toBe(false);
  });

  test("FMT_03: matching_tools are not cut by max_results", () => {
    const tools = [0.9, 0.8, 0.7].map((s, i) =>
      hit(doc(`/s::t${i}`, "tool", { owner: "/s", name: `t${i}` }), s)
    );
    const result = formatResults({
      query: "q",
      hits: [hit(doc("/s", "server", { attributes: { num_tools: 3 } }), 1), ...tools],
      maxResults: 1,
      scoreRange: { min: 0, max: 1 },
      degraded: true,
      mode: "keyword",
    });
    expect(result.tools.map((t) => t.tool_name)).toEqual(["t0"]);
    expect(result.servers[0].num_tools).toBe(3);
    expect(result.servers[0].matching_tools.map((t) => [t.tool_name, t.relevance_score])).toEqual([
      ["t0", 0.9],
      ["t1", 0.8],
      ["t2", 0.7],
    ]);
  });

  test("FMT_04: agent attributes", () => {
    const agent = doc("/agents/x", "agent", {
      name: "X",
      tags: ["ops"],
      attributes: { url: "https://x.example.test", trust_level: "verified", capabilities: ["a", 3], skills: ["s1"] },
    });
    const [result] = formatResults({
      query: "q",
      hits: [hit(agent, 2)],
      maxResults: 5,
      scoreRange: range,
      degraded: false,
      mode: "fallback",
    }).agents;
    expect(result).toEqual({
      name: "X",
      path: "/agents/x",
      description: "",
      tags: ["ops"],
      relevance_score: 1,
      url: "https://x.example.test",
      trust_level: "verified",
      capabilities: ["a"],
      skills: ["s1"],
    });
  });

  test("FMT_05: emptyResultSet", () => {
    expect(emptyResultSet("x", "keyword", true)).toMatchObject({
      query: "x",
      servers: [],
      total_agents: 0,
      degraded: true,
      mode: "keyword",
    });
  });
});
