/**
 * Metrics Module
 * Simple in-memory metrics collection with Prometheus export
 * No external dependencies - uses Map-based counters
 */

export type UpstreamOutcome = 'success' | 'not_found' | 'error';

interface LatencyMetric {
  sum: number;
  count: number;
}

/**
 * Metrics collector singleton
 */
class MetricsCollector {
  // weather_requests_total{status}
  private requests: Map<number, number> = new Map();

  // weather_upstream_calls_total{outcome}
  private upstreamCalls: Map<UpstreamOutcome, number> = new Map();

  // mcp_tool_calls_total{tool_name, outcome}
  private toolCalls: Map<string, Map<string, number>> = new Map();

  // mcp_tool_latency_ms{tool_name}
  private latencies: Map<string, LatencyMetric> = new Map();

  incrementRequest(status: number): void {
    this.requests.set(status, (this.requests.get(status) ?? 0) + 1);
  }

  incrementUpstreamCall(outcome: UpstreamOutcome): void {
    this.upstreamCalls.set(outcome, (this.upstreamCalls.get(outcome) ?? 0) + 1);
  }

  incrementToolCall(toolName: string, outcome: 'success' | 'error'): void {
    let outcomeMap = this.toolCalls.get(toolName);
    if (!outcomeMap) {
      outcomeMap = new Map();
      this.toolCalls.set(toolName, outcomeMap);
    }
    outcomeMap.set(outcome, (outcomeMap.get(outcome) ?? 0) + 1);
  }

  recordLatency(toolName: string, latencyMs: number): void {
    const metric = this.latencies.get(toolName) ?? { sum: 0, count: 0 };
    metric.sum += latencyMs;
    metric.count++;
    this.latencies.set(toolName, metric);
  }

  /**
   * Get current metrics snapshot
   */
  getMetrics() {
    const requestsData: Record<string, number> = {};
    this.requests.forEach((count, status) => {
      requestsData[String(status)] = count;
    });

    const upstreamData: Record<string, number> = {};
    this.upstreamCalls.forEach((count, outcome) => {
      upstreamData[outcome] = count;
    });

    const toolCallsData: Record<string, Record<string, number>> = {};
    this.toolCalls.forEach((outcomeMap, toolName) => {
      const outcomes: Record<string, number> = {};
      outcomeMap.forEach((count, outcome) => {
        outcomes[outcome] = count;
      });
      toolCallsData[toolName] = outcomes;
    });

    return {
      requests: requestsData,
      upstreamCalls: upstreamData,
      toolCalls: toolCallsData,
    };
  }

  /**
   * Export metrics in Prometheus text format
   * See: https://prometheus.io/docs/instrumenting/exposition_formats/
   */
  exportPrometheus(): string {
    const lines: string[] = [];

    lines.push('# HELP weather_requests_total Total number of /weather requests by response status');
    lines.push('# TYPE weather_requests_total counter');
    this.requests.forEach((count, status) => {
      lines.push(`weather_requests_total{status="${status}"} ${count}`);
    });

    lines.push('');
    lines.push('# HELP weather_upstream_calls_total Calls to the weather provider by outcome');
    lines.push('# TYPE weather_upstream_calls_total counter');
    this.upstreamCalls.forEach((count, outcome) => {
      lines.push(`weather_upstream_calls_total{outcome="${outcome}"} ${count}`);
    });

    lines.push('');
    lines.push('# HELP mcp_tool_calls_total Total number of MCP tool calls by tool name and outcome');
    lines.push('# TYPE mcp_tool_calls_total counter');
    this.toolCalls.forEach((outcomeMap, toolName) => {
      outcomeMap.forEach((count, outcome) => {
        lines.push(`mcp_tool_calls_total{tool_name="${toolName}",outcome="${outcome}"} ${count}`);
      });
    });

    lines.push('');
    lines.push('# HELP mcp_tool_latency_ms_avg Average latency of MCP tool calls in milliseconds');
    lines.push('# TYPE mcp_tool_latency_ms_avg gauge');
    this.latencies.forEach((metric, toolName) => {
      const avg = metric.count > 0 ? metric.sum / metric.count : 0;
      lines.push(`mcp_tool_latency_ms_avg{tool_name="${toolName}"} ${avg.toFixed(2)}`);
    });

    return lines.join('\n') + '\n';
  }

  /**
   * Reset all metrics (useful for testing)
   */
  reset(): void {
    this.requests.clear();
    this.upstreamCalls.clear();
    this.toolCalls.clear();
    this.latencies.clear();
  }
}

// Singleton metrics collector
export const metrics = new MetricsCollector();
