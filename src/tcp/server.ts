import * as net from 'net';
import { FrameDispatcher } from './dispatcher';
import { SessionContext } from '../session/sessionContext';
import { BeaconScanEvent, DecodedReport } from '../types/protocol';

export interface TrackerServerOptions {
  host?: string;
  idleTimeoutMs?: number;
}

export class TrackerTCPServer {
  private server: net.Server;
  private connections = new Set<net.Socket>();
  private framesReceived = 0;
  private readonly host: string;
  private readonly idleTimeoutMs: number;

  constructor(
    private port: number,
    private context: SessionContext,
    private dispatcher: FrameDispatcher,
    options: TrackerServerOptions = {}
  ) {
    this.host = options.host ?? '0.0.0.0';
    this.idleTimeoutMs = options.idleTimeoutMs ?? 60_000;
    this.server = net.createServer(this.handleConnection.bind(this));
    this.server.on('error', (error) => {
      console.error('[TCP] listener error:', error);
    });
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.server.once('error', onError);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', onError);
        console.log(`[TCP] tracker server listening on ${this.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  /** Bound port, which differs from the configured one when that was 0. */
  getPort(): number {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : this.port;
  }

  /** Stops accepting, ends open sockets, resolves once the listener is closed. */
  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
      for (const socket of this.connections) {
        socket.end();
        socket.destroy();
      }
    });
  }

  /**
   * Each socket read is one frame: decode it, then commit the result. Both
   * steps are synchronous, so frames from one connection land in the
   * histories in receipt order.
   */
  processFrame(frame: Buffer, receivedAt: Date = new Date()): { report: DecodedReport; events: BeaconScanEvent[] } {
    this.framesReceived++;
    const report = this.dispatcher.dispatch(frame, receivedAt);
    const events = this.context.commit(report);
    return { report, events };
  }

  private handleConnection(socket: net.Socket): void {
    const peer = `${socket.remoteAddress}:${socket.remotePort}`;
    console.log(`[TCP] new connection from ${peer}`);

    this.connections.add(socket);
    socket.setTimeout(this.idleTimeoutMs);

    socket.on('data', (data) => {
      const { report, events } = this.processFrame(data);
      this.logFrame(peer, data, report, events.length);

      // The tracker expects its own bytes back as the acknowledgment.
      socket.write(data);
    });

    socket.on('timeout', () => {
      console.log(`[TCP] ${peer} idle for ${this.idleTimeoutMs / 1000}s, closing`);
      socket.destroy();
    });

    socket.on('close', () => {
      this.connections.delete(socket);
      console.log(`[TCP] connection closed: ${peer}`);
    });

    socket.on('error', (error) => {
      console.error(`[TCP] socket error from ${peer}:`, error.message);
    });
  }

  private logFrame(peer: string, data: Buffer, report: DecodedReport, eventCount: number): void {
    switch (report.kind) {
      case 'status':
        console.log(`[TCP] ${peer} STT device ${report.deviceId} (${data.length} bytes), ignition ${report.status.ignition ?? 'n/a'}`);
        break;
      case 'beaconScan':
        console.log(
          `[TCP] ${peer} BLE scan device ${report.deviceId} (${data.length} bytes): ` +
          `${report.sensorsParsed} sensors, target=${report.hasTargetMac}, events=${eventCount}`
        );
        break;
      case 'unknownHeader':
        console.warn(`[TCP] ${peer} ${report.label ?? 'unknown header'}: ${report.reason}`);
        break;
      case 'parseError':
        console.warn(`[TCP] ${peer} ${report.errorKind}: ${report.reason}`);
        break;
    }
  }

  getStats() {
    return {
      openConnections: this.connections.size,
      framesReceived: this.framesReceived,
      rawReports: this.context.rawReports.size,
      rawReportsEvicted: this.context.rawReports.evicted,
      beaconEvents: this.context.beaconEvents.size,
      beaconEventCapacity: this.context.beaconEvents.capacity,
      beaconEventsEvicted: this.context.beaconEvents.evicted
    };
  }
}
