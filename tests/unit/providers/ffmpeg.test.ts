import { FFmpegWrapper } from '../../../src/providers/ffmpeg.js';

describe('FFmpegWrapper', () => {
  const ffmpeg = new FFmpegWrapper('/opt/test/ffmpeg');

  describe('parseProbe', () => {
    it('reads duration, title and the audio language', () => {
      const stdout = JSON.stringify({
        format: { duration: '125.48', tags: { title: 'Kitchen Tour' } },
        streams: [{ codec_type: 'video' }, { codec_type: 'audio', tags: { language: 'fre' } }],
      });

      expect(ffmpeg.parseProbe(stdout)).toEqual({
        durationSeconds: 125.48,
        hasAudio: true,
        title: 'Kitchen Tour',
        languageCode: undefined,
      });
    });

    it('normalizes two-letter language tags', () => {
      const stdout = JSON.stringify({
        format: { duration: '10' },
        streams: [{ codec_type: 'audio', tags: { language: 'de-DE' } }],
      });

      expect(ffmpeg.parseProbe(stdout)).toMatchObject({ hasAudio: true, languageCode: 'de' });
    });

    it('detects videos without audio', () => {
      const stdout = JSON.stringify({ format: { duration: '3.0' }, streams: [{ codec_type: 'video' }] });

      expect(ffmpeg.parseProbe(stdout)).toEqual({
        durationSeconds: 3,
        hasAudio: false,
        title: undefined,
        languageCode: undefined,
      });
    });

    it('defaults a missing duration to zero', () => {
      expect(ffmpeg.parseProbe('{}')).toMatchObject({ durationSeconds: 0, hasAudio: false });
    });

    it('rejects output that is not JSON', () => {
      expect(() => ffmpeg.parseProbe('Invalid data found')).toThrow(
        'Error while reading video metadata: invalid ffprobe output'
      );
    });
  });
});
