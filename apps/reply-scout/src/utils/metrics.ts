interface AgentMetric {
  calls: number;
  errors: number;
  totalLatency: number;
  totalTokens: number;
}

export interface MetricsSnapshot {
  itemsScored: number;
  errors: number;
  totalLatency: number;
  totalTokensUsed: number;
  agentMetrics: Record<string, AgentMetric>;
}

export class MetricsCollector {
  private itemsScored = 0;
  private errors = 0;
  private totalLatency = 0;
  private totalTokensUsed = 0;
  private agentMetrics = new Map<string, AgentMetric>();

  recordAgentCall(
    agentName: string,
    latencyMs: number,
    tokensUsed: number = 0,
    success: boolean = true
  ): void {
    let agentMetric = this.agentMetrics.get(agentName);
    if (!agentMetric) {
      agentMetric = { calls: 0, errors: 0, totalLatency: 0, totalTokens: 0 };
      this.agentMetrics.set(agentName, agentMetric);
    }

    agentMetric.calls++;
    agentMetric.totalLatency += latencyMs;
    agentMetric.totalTokens += tokensUsed;
    this.totalLatency += latencyMs;
    this.totalTokensUsed += tokensUsed;

    if (success) {
      this.itemsScored++;
    } else {
      agentMetric.errors++;
      this.errors++;
    }
  }

  getMetrics(): MetricsSnapshot {
    const agentMetrics: Record<string, AgentMetric> = {};
    for (const [name, metric] of this.agentMetrics) {
      agentMetrics[name] = { ...metric };
    }
    return {
      itemsScored: this.itemsScored,
      errors: this.errors,
      totalLatency: this.totalLatency,
      totalTokensUsed: this.totalTokensUsed,
      agentMetrics,
    };
  }

  reset(): void {
    this.itemsScored = 0;
    this.errors = 0;
    this.totalLatency = 0;
    this.totalTokensUsed = 0;
    this.agentMetrics = new Map();
  }

  getAverageLatency(): number {
    const calls = this.itemsScored + this.errors;
    return calls > 0 ? this.totalLatency / calls : 0;
  }

  getErrorRate(): number {
    const totalAttempts = this.itemsScored + this.errors;
    return totalAttempts > 0 ? this.errors / totalAttempts : 0;
  }
}
