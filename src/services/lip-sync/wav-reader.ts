import { promises as fs } from 'node:fs'
import { decode } from 'wav-decoder'
import type { Waveform } from '../../types/media'
import { DataIntegrityError } from '../../utils/errors'

/** WAV をデコードし、全チャンネルの平均でモノラル化する */
export const decodeWaveform = async (buffer: Buffer): Promise<Waveform> => {
  const audioData = await decode(buffer)
  const channels = audioData.channelData
  if (!channels.length) {
    throw new DataIntegrityError('WAV にチャンネルがありません')
  }
  if (channels.length === 1) {
    return { samples: channels[0], sampleRate: audioData.sampleRate }
  }

  const length = channels[0].length
  const samples = new Float32Array(length)
  for (const channel of channels) {
    for (let i = 0; i < length; i++) {
      samples[i] += channel[i] / channels.length
    }
  }
  return { samples, sampleRate: audioData.sampleRate }
}

export const readWaveform = async (filePath: string): Promise<Waveform> => decodeWaveform(await fs.readFile(filePath))

export const waveformDurationSec = (waveform: Waveform): number => waveform.samples.length / waveform.sampleRate
