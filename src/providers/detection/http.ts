/**
 * Detection model served over HTTP.
 *
 * The image bytes are POSTed as `application/octet-stream`; the server
 * answers with `{ "detections": [{ "label", "confidence", "box" }] }`,
 * `box` being `[x1, y1, x2, y2]` in pixels.
 */
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { DetectionFailedException, errorMessage } from "../../core/exceptions.js";
import type { DetectionModel, Finding } from "../../core/types.js";

export const DetectionResponseSchema = z.object({
  detections: z.array(
    z.object({
      label: z.string().min(1),
      confidence: z.number().min(0).max(1),
      box: z.tuple([z.number(), z.number(), z.number(), z.number()]),
    }),
  ),
});

export interface HttpDetectionModelConfig {
  url: string;
  timeoutMs?: number;
  name?: string;
}

export class HttpDetectionModel implements DetectionModel {
  readonly name: string;
  private client: AxiosInstance;
  private url: string;

  constructor(config: HttpDetectionModelConfig, client?: AxiosInstance) {
    this.url = config.url;
    this.name = config.name ?? "http";
    this.client =
      client ?? axios.create({ timeout: config.timeoutMs ?? 60_000 });
  }

  async detect(image: Uint8Array, filename: string): Promise<Finding[]> {
    let data: unknown;
    try {
      // A Buffer is sent as-is; a bare Uint8Array view would send its whole backing buffer.
      const body = Buffer.from(image.buffer, image.byteOffset, image.byteLength);
      const response = await this.client.post<unknown>(this.url, body, {
        params: { filename },
        headers: { "Content-Type": "application/octet-stream" },
        responseType: "json",
      });
      data = response.data;
    } catch (err) {
      throw new DetectionFailedException(`${this.url}: ${errorMessage(err)}`);
    }

    const parsed = DetectionResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new DetectionFailedException(
        `unexpected response from ${this.url}: ${parsed.error.issues[0]?.message ?? "invalid body"}`,
      );
    }
    return parsed.data.detections.map((d) => ({
      label: d.label,
      confidence: d.confidence,
      box: d.box,
    }));
  }
}
