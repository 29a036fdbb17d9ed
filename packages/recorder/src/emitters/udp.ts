import { createSocket } from 'node:dgram'
import type { Socket } from 'node:dgram'
import type { Segment, Subsegment } from '../entity.js'
import type { DaemonAddress, DocumentObject, Logger } from '../types.js'
import type { Emitter } from './types.js'

export const DAEMON_PROTOCOL_HEADER = `{"format": "json", "version": 1}`

export function formatDaemonPacket(document: DocumentObject): string {
  return `${DAEMON_PROTOCOL_HEADER}\n${JSON.stringify(document)}`
}

export interface UdpEmitterOptions {
  address: DaemonAddress
  logger?: Logger
}

/**
 * Sends documents as UDP datagrams to a local trace daemon, which batches and
 * forwards them. The socket is created on first use and never keeps the
 * process alive.
 */
export class UdpEmitter implements Emitter {
  private socket: Socket | undefined
  private readonly address: DaemonAddress
  private readonly logger: Logger

  constructor(options: UdpEmitterOptions) {
    this.address = options.address
    this.logger = options.logger ?? console
  }

  sendSegment(segment: Segment): boolean {
    return this.send(segment.name, segment.toDocument())
  }

  sendSubsegment(subsegment: Subsegment): boolean {
    return this.send(subsegment.name, subsegment.toDocument({ standalone: true }))
  }

  close(): void {
    this.socket?.close()
    this.socket = undefined
  }

  private send(name: string, document: DocumentObject): boolean {
    const packet = Buffer.from(formatDaemonPacket(document))
    const { host, port } = this.address
    try {
      this.getSocket().send(packet, port, host, (error) => {
        if (error) {
          this.logger.error(`[UdpEmitter] Failed to send '${name}' to ${host}:${port}:`, error)
        }
      })
      return true
    } catch (error) {
      this.logger.error(`[UdpEmitter] Failed to send '${name}' to ${host}:${port}:`, error)
      return false
    }
  }

  private getSocket(): Socket {
    if (!this.socket) {
      const socket = createSocket(`udp4`)
      socket.on(`error`, (error) => {
        this.logger.error(`[UdpEmitter] Socket error:`, error)
      })
      socket.unref()
      this.socket = socket
    }
    return this.socket
  }
}
