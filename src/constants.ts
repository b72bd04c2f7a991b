/**
 * Centralized constants for clipsense
 */

// Audio-sufficiency gate: a transcript fails only when below both minimums
export const MIN_TRANSCRIPT_WORDS = 5;
export const MIN_TRANSCRIPT_CHARS = 10;

// Uploads
export const UPLOAD_EXTENSION = '.mp4';
export const UPLOAD_CONTENT_TYPE = 'video/mp4';
export const UPLOAD_FIELD = 'video';

// API
export const API_PREFIX = '/api/v1';
export const API_VERSION = '1.0.0';
