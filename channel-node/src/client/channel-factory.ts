/**
 * Dynamic channel creation over the control channel.
 *
 * @module
 */
import {
  CHANNEL_NAME_REPLY_SIZE,
  CONTROL_CHANNEL_NAME,
  decodeChannelNameReply,
  encodeNewChannelRequest,
  ProtocolError
} from '@fifolink/protocol'
import { type Channel, openChannel } from '../ipc/channel.js'
import type { Transport } from '../ipc/transport.js'

export interface CreateChannelOptions {
  /** Names of channels still live in this session; the server must not reuse them. */
  readonly reservedNames?: Iterable<string>
}

/**
 * Ask the server for a new channel and attach to it with the client role.
 *
 * @returns An ephemeral channel owned by the caller
 * @throws ProtocolError if the reply is malformed or names a live channel
 * @throws TransportError if the new channel cannot be attached
 */
export async function createChannel(
  control: Channel,
  transport: Transport,
  options: CreateChannelOptions = {}
): Promise<Channel> {
  const reply = await control.exchange(async () => {
    await control.writeExact(encodeNewChannelRequest())
    return control.readExact(CHANNEL_NAME_REPLY_SIZE)
  })
  const name = decodeChannelNameReply(reply)

  if (name === control.name || name === CONTROL_CHANNEL_NAME) {
    throw new ProtocolError(`Server assigned the control channel name "${name}" to a new channel`)
  }
  for (const reserved of options.reservedNames ?? []) {
    if (reserved === name) {
      throw new ProtocolError(`Server assigned "${name}", which is still live`)
    }
  }

  return openChannel(transport, name, 'client', {
    bufferCapacity: control.bufferCapacity,
    kind: 'ephemeral'
  })
}
