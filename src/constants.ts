import os from 'node:os';
import path from 'node:path';

export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'vidscore';

export const DEFAULT_CONFIG_FILE = `${PROGRAM_NAME}-config.yaml`;
export const DEFAULT_SCRATCH_DIRECTORY = path.join(os.tmpdir(), PROGRAM_NAME);
export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_VERBOSE = false;
export const DEFAULT_DEBUG = false;

// Models
export const DEFAULT_TRANSCRIPTION_MODEL = 'whisper-1';
export const DEFAULT_SUMMARIZATION_MODEL = 'gpt-4o-mini';
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_TOKENIZER_ENCODING = 'cl100k_base';

// Acquisition
export const DEFAULT_UPLOAD_CHUNK_SIZE = 1024 * 1024;
export const DEFAULT_MAX_UPLOAD_SIZE = 512 * 1024 * 1024;
export const DEFAULT_DOWNLOADER_BINARY = 'yt-dlp';
export const DEFAULT_DOWNLOAD_RETRIES = 3;
export const DEFAULT_SOCKET_TIMEOUT_SECONDS = 30;
export const DEFAULT_PLAYER_CLIENTS = ['android', 'web'];
export const DEFAULT_DOWNLOAD_FORMAT = 'bv*+ba/b';
export const DEFAULT_MERGE_FORMAT = 'mp4';
export const DEFAULT_SETTLE_ATTEMPTS = 10;
export const DEFAULT_SETTLE_INTERVAL_MS = 200;
export const DOWNLOADS_SUBDIRECTORY = 'downloads';

// Summarization
export const DEFAULT_SUMMARY_MAX_LENGTH = 180;
export const DEFAULT_SUMMARY_MIN_LENGTH = 60;
export const DEFAULT_INPUT_TOKEN_BUDGET = 900;
export const SHORT_INPUT_TOKENS = 30;
export const SHORT_INPUT_MAX_LENGTH = 60;
export const SHORT_INPUT_MIN_LENGTH = 10;
export const MAP_MAX_LENGTH = 150;
export const MAP_MIN_LENGTH = 40;
export const RETRY_MAX_LENGTH_FLOOR = 30;
export const RETRY_MIN_LENGTH_FLOOR = 5;
export const EMPTY_TRANSCRIPT_SUMMARY = 'No content to summarize.';

// Scoring
export const SEMANTIC_WEIGHT = 0.65;
export const COVERAGE_WEIGHT = 0.20;
export const CONCISENESS_WEIGHT = 0.15;
export const CONCISENESS_TARGET_WORDS = 140;
export const CONCISENESS_LOWER_BOUND = 60;

// Pipeline
export const DEFAULT_ITEM_TIMEOUT_MS = 10 * 60 * 1000;

// HTTP
export const URL_REQUEST_BODY_LIMIT = 64 * 1024;
export const MAX_UPLOAD_FILES = 16;
