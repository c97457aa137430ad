/**
 * codegen ツールが受け付けるフラグ
 */

/**
 * 許可されたフラグ名
 * タイミング・リセット・I/O 信号名・出力形式・メモリ構成にまたがる
 */
export const CODEGEN_FLAGS: ReadonlySet<string> = new Set([
  // タイミング
  "clock_period_ps",
  "additional_input_delay_ps",
  "pipeline_stages",
  "clock_margin_percent",
  "period_relaxation_percent",
  "delay_model",
  "io_constraints",
  // リセット
  "reset",
  "reset_active_low",
  "reset_asynchronous",
  "reset_data_path",
  // I/O 信号
  "input_valid_signal",
  "output_valid_signal",
  "manual_load_enable_signal",
  "flop_inputs",
  "flop_inputs_kind",
  "flop_outputs",
  "flop_outputs_kind",
  "flop_single_value_channels",
  "add_idle_output",
  "receives_first_sends_last",
  "gate_recvs",
  // 命名
  "top",
  "module_name",
  "streaming_channel_data_suffix",
  "streaming_channel_ready_suffix",
  "streaming_channel_valid_suffix",
  // 出力形式
  "assert_format",
  "gate_format",
  "smulp_format",
  "umulp_format",
  "use_system_verilog",
  "separate_lines",
  "array_index_bounds_checking",
  // 構造
  "generator",
  "ram_configurations",
]);

/**
 * ユーザー指定の引数に上書きされる既定値
 */
export const DEFAULT_CODEGEN_ARGS: Readonly<Record<string, string>> = Object.freeze({
  delay_model: "unit",
  use_system_verilog: "True",
});
