import type { VercelRequest, VercelResponse } from "@vercel/node";
import { z } from "zod";
import type { AnalyzeRequest, AnalyzeResponse } from "../types";
import { loadConfig } from "../utils/config";
import { FakeNewsDetector, getDefaultDetector } from "../utils/detector";
import { quickStats, summarizeResult } from "../utils/report";

const AnalyzeRequestSchema = z.object({
  text: z.string(),
});

export interface ErrorResponse {
  error: string;
}

export interface HandlerOutcome {
  status: number;
  payload: AnalyzeResponse | ErrorResponse;
}

export function buildAnalyzeResponse(
  body: unknown,
  detector: FakeNewsDetector = getDefaultDetector(),
): HandlerOutcome {
  const parsed = AnalyzeRequestSchema.safeParse(body);

  if (!parsed.success) {
    return {
      status: 400,
      payload: { error: "`text` field (string) is required in the body" },
    };
  }

  const request: AnalyzeRequest = { text: parsed.data.text };
  const result = detector.analyze(request.text);

  // Too little text is a prompt for more input, not a failed request.
  if (!result) {
    return {
      status: 200,
      payload: {
        ok: false,
        reason: "insufficient_input",
        message: `Please enter at least ${detector.minTextLength} characters of text to analyze.`,
      },
    };
  }

  return {
    status: 200,
    payload: {
      ok: true,
      result,
      summary: summarizeResult(result),
      stats: quickStats(request.text),
    },
  };
}

/** The part of a Vercel response the handler writes to. */
export interface ApiResponse {
  setHeader(name: string, value: string): unknown;
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
  end(): unknown;
}

export function handleAnalyze(req: Pick<VercelRequest, "method" | "body">, res: ApiResponse) {
  try {
    const { allowedOrigin } = loadConfig();

    res.setHeader("Access-Control-Allow-Origin", allowedOrigin);
    res.setHeader("Access-Control-Allow-Methods", "POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    // Handle preflight OPTIONS request
    if (req.method === "OPTIONS") {
      return res.status(200).end();
    }

    if (req.method !== "POST") {
      res.setHeader("Allow", "POST");
      return res.status(405).json({ error: "Method Not Allowed" });
    }

    const { status, payload } = buildAnalyzeResponse(req.body);
    return res.status(status).json(payload);
  } catch (error) {
    console.error("[analyze] Unexpected failure:", error);
    return res.status(500).json({ error: "Internal Server Error" });
  }
}

export default function handler(req: VercelRequest, res: VercelResponse) {
  return handleAnalyze(req, res);
}
