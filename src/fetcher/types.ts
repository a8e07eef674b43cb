// fetcher 请求配置与结果：对 fetch RequestInit 的精简封装


export interface RequestConfig {
  headers?: Record<string, string>;
  /** 超时毫秒，内部用 AbortSignal.timeout 实现 */
  timeoutMs?: number;
}


/** 文本响应：statusCode 为 0 表示传输层失败（DNS、连接、超时），此时 errorMessage 带原因 */
export interface HttpTextResult {
  statusCode: number;
  body: string;
  /** 最终 URL（含重定向后） */
  finalUrl: string;
  errorMessage?: string;
}


/** 编排层与补图抓取只依赖该接口，测试注入内存实现 */
export interface HttpClient {
  fetchText(url: string, config?: RequestConfig): Promise<HttpTextResult>;
}
