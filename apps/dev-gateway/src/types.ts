/**
 * Gateway Configuration Types
 */

export interface GatewayConfig {
  /**
   * 网关端口
   */
  port: number;

  /**
   * 静态前端文件目录，映射到 /static/*
   */
  staticDir: string;

  /**
   * 活动种子数据 JSON 文件（未设置时使用内置数据）
   */
  seedFile?: string;

  /**
   * 报名人数达到 max_participants 时拒绝报名
   */
  enforceCapacity: boolean;

  /**
   * 请求计时日志文件（未设置时只输出到控制台）
   */
  timingLogFile?: string;
}

/**
 * 部分网关配置（用于合并）
 */
export type PartialGatewayConfig = Partial<GatewayConfig>;
