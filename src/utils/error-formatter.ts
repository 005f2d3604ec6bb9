/**
 * Error formatting utilities for user-friendly error messages
 */

import {
  ApiError,
  AuthError,
  AuthTimeout,
  ConfigError,
  InaccessiblePlaylist,
  InvalidPlaylistReference,
  NetworkError,
  RateLimited
} from '../errors.js';
import { PLATFORM_LABELS } from '../types.js';

interface FormattedError {
  message: string;
  suggestion?: string;
  technical?: string;
}

/**
 * Format error for user display with context and suggestions
 */
export function formatUserError(error: unknown, context: string): string {
  const formatted = parseError(error, context);

  let message = formatted.message;

  if (formatted.suggestion) {
    message += ` | Suggestion: ${formatted.suggestion}`;
  }

  if (formatted.technical) {
    message += ` | Technical: ${formatted.technical}`;
  }

  return message;
}

/**
 * Parse error and provide user-friendly message with context
 */
function parseError(error: unknown, context: string): FormattedError {
  if (error instanceof ConfigError) {
    return {
      message: `Configuration problem while ${context}`,
      suggestion: 'Check config/.env against config/.env.example.',
      technical: shortenMessage(error.message)
    };
  }

  if (error instanceof AuthTimeout) {
    return {
      message: `${PLATFORM_LABELS[error.platform]} authorization timed out while ${context}`,
      suggestion: 'Finish the consent page in the browser within the time limit, then try again.'
    };
  }

  if (error instanceof AuthError) {
    return {
      message: `${PLATFORM_LABELS[error.platform]} authentication failed while ${context}`,
      suggestion: 'Re-run the authorization and accept the requested permissions. Check the redirect URI registered on the application.',
      technical: shortenMessage(error.message)
    };
  }

  if (error instanceof InaccessiblePlaylist) {
    return {
      message: `${PLATFORM_LABELS[error.platform]} playlist ${error.playlistId} is private or does not exist`,
      suggestion: 'Make the playlist public or check the link.'
    };
  }

  if (error instanceof InvalidPlaylistReference) {
    return {
      message: `Unrecognized playlist link while ${context}`,
      suggestion: 'Use a Spotify or Deezer playlist URL, a spotify:playlist: URI or a playlist ID.',
      technical: shortenMessage(error.message)
    };
  }

  if (error instanceof RateLimited) {
    return {
      message: `Rate limited by ${PLATFORM_LABELS[error.platform]} while ${context}`,
      suggestion: 'API rate limit reached. Wait a few minutes before retrying.',
      technical: `${error.attempts} attempts`
    };
  }

  if (error instanceof NetworkError) {
    return {
      message: `Cannot reach ${PLATFORM_LABELS[error.platform]} while ${context}`,
      suggestion: 'Check your internet connection and try again.',
      technical: extractTechnicalDetails(error.message)
    };
  }

  if (error instanceof ApiError) {
    return {
      message: `${PLATFORM_LABELS[error.platform]} rejected a request while ${context}`,
      suggestion: 'Check logs for details. If persistent, report issue with error details.',
      technical: extractTechnicalDetails(error.message)
    };
  }

  const errorStr = error instanceof Error ? error.message : String(error);

  // Generic error
  return {
    message: `Error ${context}: ${shortenMessage(errorStr)}`,
    suggestion: 'Check logs for details. If persistent, report issue with error details.',
    technical: extractTechnicalDetails(errorStr)
  };
}

/**
 * Extract technical details without full stack trace
 */
function extractTechnicalDetails(errorStr: string): string | undefined {
  // Remove stack traces
  const cleaned = errorStr.split('\n')[0];
  return cleaned ? shortenMessage(cleaned) : undefined;
}

/**
 * Shorten long error messages
 */
function shortenMessage(msg: string): string {
  const maxLength = 150;
  if (msg.length <= maxLength) {
    return msg;
  }
  return msg.substring(0, maxLength) + '...';
}
