import * as dotenv from 'dotenv';
dotenv.config();

function list(value: string): string[] {
    return value
        .split(' ')
        .map((s) => s.trim())
        .filter(Boolean);
}

export const ENV = {
    // Transcript Store: one <videoId>.<lang>.vtt per video
    subsDir: process.env.SUBS_DIR || 'subs',
    // Rendered clip cache plus its temp_<videoId>.* working files
    clipsDir: process.env.CLIPS_DIR || 'gifs',
    // Where temp_<videoId>.mp3 audio lands during transcription
    tempDir: process.env.TEMP_DIR || '.',
    logsDir: process.env.LOGS_DIR || 'logs',
    platformBaseUrl: process.env.PLATFORM_BASE_URL || 'https://www.youtube.com',
    language: process.env.TRANSCRIPT_LANGUAGE || 'el',
    // Optional: overrides the built-in priming phrase for the target language
    transcribePrompt: process.env.TRANSCRIBE_PROMPT || '',
    transcribeCmd: process.env.TRANSCRIBE_CMD || 'python3',
    transcribeArgs: list(process.env.TRANSCRIBE_ARGS || 'runners/transcribe.py'),
    transcribeModel: process.env.TRANSCRIBE_MODEL || 'small',
    transcribeDevice: process.env.TRANSCRIBE_DEVICE || 'cpu',
    transcribeComputeType: process.env.TRANSCRIBE_COMPUTE_TYPE || 'int8',
    transcribeBeamSize: Number(process.env.TRANSCRIBE_BEAM_SIZE || 5),
    embedCmd: process.env.EMBED_CMD || 'python3',
    embedArgs: list(process.env.EMBED_ARGS || 'runners/embed.py'),
    // Index and query must share this; a mismatch is rejected at search time
    embedModel: process.env.EMBED_MODEL || 'all-MiniLM-L6-v2',
    // Optional: override yt-dlp binary name/path
    ytdlpBin: process.env.YTDLP_BIN || 'yt-dlp',
    // Optional: explicit python interpreter with yt_dlp installed for fallback (e.g. .venv/bin/python)
    ytdlpPythonBin: process.env.YTDLP_PYTHON_BIN || '.venv/bin/python',
    ytdlpCookiesFile: process.env.YTDLP_COOKIES_FILE || '',
    // e.g. "firefox" or "chrome:Profile 1"
    ytdlpCookiesFromBrowser: process.env.YTDLP_COOKIES_FROM_BROWSER || '',
    ytdlpUserAgent: process.env.YTDLP_USER_AGENT || '',
    ytdlpExtraArgs: list(process.env.YTDLP_EXTRA_ARGS || ''),
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
    // Optional: directory holding ffmpeg for yt-dlp merges
    ffmpegLocation: process.env.FFMPEG_LOCATION || '',
    // Optional: caption font; when unset a list of common system fonts is searched
    fontFile: process.env.FONT_FILE || '',
};

export type Env = typeof ENV;
