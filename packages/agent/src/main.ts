import { LogLevel, noopLogger, type ComponentLogger, type JouleGateConfig } from "@joulegate/shared";
import { BudgetService } from "./budgetService";
import { CpuPowerReader, NvidiaSmiPowerReader, type PowerReader } from "./readers";
import { PowerSampler } from "./sampler";
import { AgentServer } from "./server";

export interface StartAgentOptions {
  logger?: ComponentLogger;
  /** Replaces the readers built from config. */
  readers?: PowerReader[];
  /** `false` keeps the service in process without the HTTP boundary. */
  listen?: boolean;
}

export interface AgentHandle {
  service: BudgetService;
  sampler: PowerSampler;
  server: AgentServer | null;
  stop(): Promise<void>;
}

export function createReaders(config: JouleGateConfig, logger: ComponentLogger = noopLogger): PowerReader[] {
  const { energy } = config;
  const readers: PowerReader[] = [new CpuPowerReader({ tdpW: energy.cpuTdpW })];
  if (energy.gpu.enabled) {
    readers.push(
      new NvidiaSmiPowerReader({
        command: energy.gpu.command,
        deviceIndex: energy.gpu.deviceIndex,
        timeoutMs: energy.readTimeoutMs,
        logger
      })
    );
  }
  return readers;
}

export async function startAgent(config: JouleGateConfig, options: StartAgentOptions = {}): Promise<AgentHandle> {
  const logger = options.logger ?? noopLogger;
  const { energy } = config;

  const service = new BudgetService({
    smoothingAlpha: energy.smoothingAlpha,
    idleSeedCpuW: energy.idleSeedCpuW,
    idleSeedGpuW: energy.idleSeedGpuW,
    idleLearnW: energy.idleLearnW,
    logger: logger.child("agent.budget")
  });
  const sampler = new PowerSampler({
    readers: options.readers ?? createReaders(config, logger.child("agent.readers")),
    service,
    sampleHz: energy.sampleHz,
    logger: logger.child("agent.sampler")
  });

  let server: AgentServer | null = null;
  if (options.listen ?? true) {
    server = new AgentServer(config.agent, service, logger.child("agent.http"));
    await server.start();
  }
  sampler.start();
  logger.log(LogLevel.INFO, "agent_started", {
    cpuTdpW: energy.cpuTdpW,
    smoothingAlpha: energy.smoothingAlpha,
    sampleHz: energy.sampleHz,
    idleLearnW: energy.idleLearnW,
    listening: server ? server.url() : null
  });

  return {
    service,
    sampler,
    server,
    async stop() {
      await sampler.stop();
      if (server) {
        await server.stop();
      }
      logger.log(LogLevel.INFO, "agent_stopped");
    }
  };
}
