import { encodeQuit } from '@fifolink/protocol'
import type { Channel } from '../ipc/channel.js'

/**
 * Send quit on `channel` and release it.
 *
 * Quit has no reply, so nothing is awaited beyond the write. The channel's
 * local handles are released whatever the outcome; the client never removes
 * named resources (the server removes an ephemeral channel's on quit).
 * Every later operation on the channel fails with ChannelClosedError.
 */
export async function shutdown(channel: Channel): Promise<void> {
  try {
    await channel.exchange(() => channel.writeExact(encodeQuit()))
  } finally {
    await channel.close()
  }
}
