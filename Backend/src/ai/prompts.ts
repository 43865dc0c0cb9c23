// src/ai/prompts.ts
// Prompt text for the intent-finder tasks. Kept apart from the call sites so
// wording can change without touching parsing.

import type { ChatMessage } from "./llm/llm-providers";
import type { JudgeItem } from "../leadgen/types";

export interface PostForReply {
  title: string;
  snippet: string;
  url: string;
}

const sys = (content: string): ChatMessage => ({ role: "system", content });
const user = (content: string): ChatMessage => ({ role: "user", content });

export function describeFromSearchPrompt(url: string, searchInfo: string): ChatMessage[] {
  return [
    sys("Summarize what this company or product does in 4-6 short, neutral sentences, using only the search results given. Cover its core business, products or services."),
    user(`Website: ${url}\n\nSearch results:\n${searchInfo}\n\nWhat does this company/product do?`),
  ];
}

export function describeFromKnowledgePrompt(url: string): ChatMessage[] {
  return [
    sys("From what you already know, summarize what this company or product does in 4-6 short, neutral sentences. Cover its core business, products or services. If you do not know it, say so plainly."),
    user(`Website: ${url}\nWhat does this company/product do?`),
  ];
}

export function customerSegmentPrompt(description: string): ChatMessage[] {
  return [
    sys("Name the primary target customer segment for this product in 1-2 sentences. State whether it is B2B, B2C or B2B2C, and the concrete customer type (for example small and medium businesses, enterprises, individual consumers, creators, developers)."),
    user(`Product description: ${description}\nWhich customer segment fits best?`),
  ];
}

export function painPointsPrompt(description: string): ChatMessage[] {
  return [
    sys('List 3-5 customer problems this product removes. Describe the customer\'s struggle, not the product\'s features, each in 5-10 words. Reply as JSON: {"pain_points": ["..."]}.'),
    user(`Product description: ${description}\n\nWhich pains does it take away?\nGood: "Losing leads to slow follow-up", "Paying for too many disconnected tools".\nBad (feature talk): "AI-powered automation", "Cloud-based platform".`),
  ];
}

export function gtmTopicsPrompt(description: string): ChatMessage[] {
  return [
    sys('Propose 5 go-to-market topics framed around the problems and frustrations this product addresses, never around its features. Reply as JSON: {"topics": ["..."]}.'),
    user(`Product: ${description}\n\nGood: "Remote Team Coordination Pain", "Manual Reporting Overhead".\nBad: "Web-Based Dashboards", "Multi-Language Support".`),
  ];
}

export function searchKeywordsPrompt(topic: string, description: string): ChatMessage[] {
  return [
    sys('Write 6-8 web search queries that surface business decision-makers with budget who are evaluating, comparing, or switching tools for their company or team. Skip students, hobbyists, tutorials, and people after free options only. Reply as JSON: {"queries": ["..."]}.'),
    user([
      `GTM topic: ${topic}`,
      `Product: ${description}`,
      "",
      "Favor phrasing such as \"for our team\", \"enterprise\", vendor comparisons (\"X vs Y for business\"), \"migrating from\", \"replacing our\", \"budget for\", and department mentions (\"for our sales team\").",
      "Examples: \"CRM for small business looking to upgrade\", \"our team needs better collaboration software\".",
    ].join("\n")),
  ];
}

export function judgePostsPrompt(topic: string, items: readonly JudgeItem[]): ChatMessage[] {
  const list = items
    .map((i) => `Title: ${i.title}\nSnippet: ${i.snippet}\nURL: ${i.url}`)
    .join("\n\n");
  return [
    sys('Decide for each post whether its author looks like a business buyer with budget and authority who is actively evaluating or purchasing a solution for a company or team. Reply with a JSON array of objects {"url": string, "keep": boolean, "reason": string}, one per post, copying the URL exactly. Use an array even for one post.'),
    user([
      `GTM topic: ${topic}`,
      "",
      "KEEP: \"our company\" / \"my team\" / \"we need\" language, active vendor comparisons, migrations, budget or procurement mentions, business pain that costs time or money.",
      "DROP: students and coursework, hobby or side projects, free-only requests, tutorials and how-tos, news without an evaluation, general chatter.",
      "",
      "Posts:",
      list,
    ].join("\n")),
  ];
}

export function replyPrompt(topic: string, post: PostForReply): ChatMessage[] {
  return [
    sys("Write a short public reply (2-3 sentences) to this post: helpful, respectful, not salesy. Markdown only."),
    user(`Topic: ${topic}\nTitle: ${post.title}\nSnippet: ${post.snippet}\nURL: ${post.url}`),
  ];
}
