import type {
  ImageCandidate,
  ScoredCandidate,
  TextCandidate,
  VideoCandidate,
  WebhookResponse
} from '../types';

export const NO_RESULTS_MESSAGE = 'No results found';

function textMessage(text: string) {
  return { text: { text: [text] } };
}

export function videoCaption(video: VideoCandidate): string {
  return (
    `🎬 **${video.title}**\n` +
    `📺 ${video.description}\n` +
    `⏱ Duration: ${video.duration} | 👁 Views: ${video.views}\n` +
    `🔗 Watch here: ${video.videoUrl}`
  );
}

function formatText(text: TextCandidate, query: string): WebhookResponse {
  return {
    sessionInfo: { parameters: { has_image: false, has_video: false, query } },
    fulfillmentResponse: {
      messages: [textMessage(`${text.content}\n\nSource: ${text.source}`)]
    }
  };
}

function formatImage(image: ImageCandidate, query: string): WebhookResponse {
  return {
    sessionInfo: {
      parameters: {
        has_image: true,
        has_video: false,
        query,
        image_url: image.imageUrl,
        source: image.source,
        page: image.page
      }
    },
    fulfillmentResponse: {
      messages: [
        textMessage(`I found an image from ${image.source} (Page ${image.page})`),
        {
          payload: {
            richContent: [[{ type: 'image', rawUrl: image.imageUrl, accessibilityText: `Image from ${image.source}` }]]
          }
        }
      ]
    }
  };
}

function formatVideo(video: VideoCandidate, query: string): WebhookResponse {
  return {
    sessionInfo: {
      parameters: {
        query,
        has_video: true,
        has_image: false,
        video_title: video.title,
        video_url: video.videoUrl,
        video_description: video.description,
        video_duration: video.duration,
        video_views: video.views
      }
    },
    fulfillmentResponse: {
      messages: [
        textMessage(videoCaption(video)),
        {
          payload: {
            richContent: [[{ type: 'video', rawUrl: video.videoUrl, accessibilityText: video.title }]]
          }
        }
      ]
    }
  };
}

/** Maps the selected result (or none) to the agent platform's webhook shape. */
export function formatResult(result: ScoredCandidate | null, query: string): WebhookResponse {
  if (!result) {
    return {
      sessionInfo: { parameters: { has_image: false, has_video: false, query } },
      fulfillmentResponse: { messages: [textMessage(NO_RESULTS_MESSAGE)] }
    };
  }

  const { candidate } = result;
  switch (candidate.type) {
    case 'text':
      return formatText(candidate, query);
    case 'image':
      return formatImage(candidate, query);
    case 'video':
      return formatVideo(candidate, query);
  }
}

export function formatError(message: string): WebhookResponse {
  return {
    sessionInfo: { parameters: { has_image: false, has_video: false } },
    fulfillmentResponse: { messages: [textMessage(`Error: ${message}`)] }
  };
}
