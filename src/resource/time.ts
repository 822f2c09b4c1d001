/***
 * Time — Frame timing resource maintained by SystemRunner.
 *
 * delta is the scaled duration of the current frame in seconds,
 * raw_delta the unscaled one. elapsed accumulates scaled time.
 *
 ***/

import { define_type } from "../component/component";

export interface TimeState {
  delta: number;
  raw_delta: number;
  elapsed: number;
  time_scale: number;
  frame_count: number;
}

export const Time = define_type<TimeState>("Time");

export const create_time = (): TimeState => ({
  delta: 0,
  raw_delta: 0,
  elapsed: 0,
  time_scale: 1,
  frame_count: 0,
});

export function advance_time(time: TimeState, raw_delta: number): void {
  time.raw_delta = raw_delta;
  time.delta = raw_delta * time.time_scale;
  time.elapsed += time.delta;
  time.frame_count++;
}

/** Negative scales clamp to 0 (paused). */
export function set_time_scale(time: TimeState, scale: number): void {
  time.time_scale = scale > 0 ? scale : 0;
}

export const fps = (time: TimeState): number =>
  time.raw_delta > 0 ? 1 / time.raw_delta : 0;
