/**
 * Progressor Protocol Constants
 *
 * GATT identifiers, control opcodes and notification frame layout.
 * These must match the Progressor firmware.
 */

// ============================================================================
// GATT IDENTIFIERS
// ============================================================================

export const ProgressorUuids = {
  SERVICE: "7e4e1701-1ea6-40c9-9dcc-13d34ffead57",

  /** Notify: binary response frames */
  DATA: "7e4e1702-1ea6-40c9-9dcc-13d34ffead57",

  /** Write-with-response: 2-byte opcode commands */
  CONTROL: "7e4e1703-1ea6-40c9-9dcc-13d34ffead57",
} as const;

// ============================================================================
// CONTROL OPCODES
// ============================================================================

export const ControlOpcode = {
  START_WEIGHT_MEASUREMENT: 0x65,
  END_WEIGHT_MEASUREMENT: 0x66,
} as const;

export type ControlOpcode = (typeof ControlOpcode)[keyof typeof ControlOpcode];

// ============================================================================
// NOTIFICATION FRAMES
// ============================================================================

export const ResponseCode = {
  SAMPLE_BATTERY_VOLTAGE: 0,
  WEIGHT_MEASUREMENT: 1,
  LOW_POWER_WARNING: 4,
} as const;

export const FrameLayout = {
  /**
   * Byte 0 is the response code, byte 1 is reserved.
   */
  HEADER_SIZE: 2,

  /**
   * Weight frame: float32 value at 2..6, uint32 counter at 6..10.
   */
  WEIGHT_FRAME_SIZE: 10,

  /**
   * Battery frame: uint32 raw voltage at 2..6.
   */
  BATTERY_FRAME_SIZE: 6,

  /**
   * Low-power warning carries no payload.
   */
  LOW_POWER_FRAME_SIZE: 1,

  /**
   * Control commands are [opcode, 0x00].
   */
  CONTROL_COMMAND_SIZE: 2,
} as const;
