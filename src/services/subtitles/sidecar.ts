import path from 'path';
import { Language } from '../../types/subtitles.js';

/**
 * Path of the sidecar subtitle for a video:
 * "/lib/Movie (2019)/Movie (2019).mkv" + Hebrew + ".srt" -> "/lib/Movie (2019)/Movie (2019).he.srt"
 */
export function getSidecarPath(videoPath: string, language: Language, subtitleExtension: string): string {
  const parsed = path.parse(videoPath);
  return path.join(parsed.dir, `${parsed.name}.${language.alpha2}${subtitleExtension}`);
}
