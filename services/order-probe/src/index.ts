/**
 * Order Probe
 * Measures order-entry latency against the Deribit JSON-RPC WebSocket gateway.
 *
 * Startup: load config and credentials, connect, authenticate, subscribe to the raw
 * book, resolve tick size and reference price. Then run the open -> edit -> cancel
 * lifecycle for the configured number of iterations, streaming every sample to CSV,
 * and print the latency summary at the end.
 */

import { config } from 'dotenv';
import { type Clock, loadSecretsFromFiles, Logger, SystemClock } from '@latlab/shared';
import {
  CLIENT_ID_ENV,
  CLIENT_SECRET_ENV,
  loadCredentials,
  loadProbeConfig,
  resolveConfigPath,
} from './config/ConfigLoader';
import type { Credentials, ProbeConfig } from './config/ConfigSchema';
import { formatSummary } from './console/SummaryReport';
import { type MarketReference, OrderLifecycleDriver } from './engine/OrderLifecycleDriver';
import { DeribitSession } from './exchanges/DeribitSession';
import { LatencyRecorder } from './latency/LatencyRecorder';
import { type LatencySummary, summarize } from './latency/SummaryStatistics';
import { TickTracker } from './market/TickTracker';
import { CsvSampleSink } from './output/CsvSampleSink';
import { JsonRpcWsClient } from './transport/JsonRpcWsClient';
import type { IterationOutcome } from './types';
import { toError } from './utils/errors';

const logger = Logger.getInstance('order-probe');

export interface ProbeResult {
  outcomes: IterationOutcome[];
  summary: LatencySummary;
  csvPath: string;
}

export class OrderProbeApplication {
  private readonly transport: JsonRpcWsClient;
  private readonly ticks: TickTracker;

  constructor(
    private readonly probeConfig: ProbeConfig,
    private readonly credentials: Credentials,
    private readonly clock: Clock = new SystemClock(),
    transport?: JsonRpcWsClient,
  ) {
    this.transport = transport ?? JsonRpcWsClient.forNetwork(probeConfig.testnet);
    this.ticks = new TickTracker(clock);
  }

  getTransport(): JsonRpcWsClient {
    return this.transport;
  }

  async run(): Promise<ProbeResult> {
    const cfg = this.probeConfig;
    logger.info('Starting order probe', undefined, {
      testnet: cfg.testnet,
      instrument: cfg.instrumentName,
      side: cfg.side,
      iterations: cfg.numIterations,
    });

    await this.transport.connect();
    const detachTicks = this.ticks.attach(this.transport);

    try {
      const session = new DeribitSession(this.transport);
      await session.authenticate(this.credentials.clientId, this.credentials.clientSecret);

      const subscribed = cfg.subscribeRawBook
        ? await session.subscribeRawBook(cfg.instrumentName)
        : false;

      const market: MarketReference = {
        tickSize: await session.fetchTickSize(cfg.instrumentName),
        referencePrice: await session.fetchReferencePrice(cfg.instrumentName, cfg.basePrice),
      };
      logger.info('Market reference resolved', undefined, { ...market });

      const sink = new CsvSampleSink(cfg.outputLatencyCsv);
      const recorder = new LatencyRecorder({ ticks: subscribed ? this.ticks : undefined, sink });
      const driver = new OrderLifecycleDriver(cfg, market, {
        transport: this.transport,
        recorder,
        clock: this.clock,
      });

      const outcomes = await driver.run();
      const summary = summarize(recorder.samples());
      logger.info('Run complete', undefined, {
        samples: recorder.size(),
        csv: sink.getPath(),
        skipped: outcomes.filter((outcome) => outcome.finalState === 'skipped-edit').length,
      });

      if (cfg.printSummary) {
        console.log(formatSummary(summary));
      }
      return { outcomes, summary, csvPath: sink.getPath() };
    } finally {
      detachTicks();
      this.transport.close();
    }
  }
}

export async function main(): Promise<void> {
  config();
  loadSecretsFromFiles({ keys: [CLIENT_ID_ENV, CLIENT_SECRET_ENV] });

  let app: OrderProbeApplication | null = null;
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn(`Received ${signal}, closing transport`);
    app?.getTransport().close();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const probeConfig = loadProbeConfig(resolveConfigPath());
    const credentials = loadCredentials();
    app = new OrderProbeApplication(probeConfig, credentials);
    await app.run();
  } catch (error) {
    logger.fatal('Order probe failed', toError(error));
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

if (require.main === module) {
  void main();
}
