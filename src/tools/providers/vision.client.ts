/**
 * Image description client
 *
 * Sends a base64 JPEG plus a prompt to a vision-capable chat model through
 * the OpenAI SDK.
 */

import type OpenAI from 'openai';

export interface DescribeImageRequest {
  /** Base64-encoded JPEG, without data: prefix */
  base64Jpeg: string;
  prompt: string;
  model: string;
  maxTokens?: number;
}

export interface VisionClient {
  describeImage(request: DescribeImageRequest): Promise<string>;
}

export const NO_DESCRIPTION = 'No description returned.';

export function createVisionClient(openai: OpenAI): VisionClient {
  return {
    async describeImage(request: DescribeImageRequest): Promise<string> {
      const response = await openai.chat.completions.create({
        model: request.model,
        max_tokens: request.maxTokens ?? 1024,
        messages: [
          {
            role: 'user',
            content: [
              {
                type: 'image_url',
                image_url: {
                  url: `data:image/jpeg;base64,${request.base64Jpeg}`,
                },
              },
              { type: 'text', text: request.prompt },
            ],
          },
        ],
      });

      const content = response.choices[0]?.message.content;
      return content && content.trim() !== '' ? content : NO_DESCRIPTION;
    },
  };
}
