import type { AnimationController, AnimationTrack, KeyframeSequence } from "@m3gkit/scene";
import { ANIMATION_PROPERTIES, INTERPOLATION, KEYFRAME_ENCODING_RAW, REPEAT_MODE } from "../constants.js";
import { writeObject3D } from "./object3d.js";
import type { ObjectWriter } from "./objectWriter.js";

export function writeAnimationController(w: ObjectWriter, controller: AnimationController): void {
  writeObject3D(w, controller);
  w.float32("speed", controller.speed ?? 1);
  w.float32("weight", controller.weight ?? 1);
  w.int32("activeInterval.start", controller.activeInterval?.start ?? 0);
  w.int32("activeInterval.end", controller.activeInterval?.end ?? 0);
  w.float32("referenceSequenceTime", controller.referenceSequenceTime ?? 0);
  w.int32("referenceWorldTime", controller.referenceWorldTime ?? 0);
}

export function writeAnimationTrack(w: ObjectWriter, track: AnimationTrack): void {
  writeObject3D(w, track);
  w.ref("keyframeSequence", track.keyframeSequence);
  w.ref("controller", track.controller);
  w.uint32("property", ANIMATION_PROPERTIES[track.property].id);
}

export function writeKeyframeSequence(w: ObjectWriter, sequence: KeyframeSequence): void {
  writeObject3D(w, sequence);
  const keyframes = w.encode.transforms.keyframes.get(sequence) ?? sequence.keyframes;
  const { componentCount } = sequence;

  if ((sequence.interpolation === "slerp" || sequence.interpolation === "squad") && componentCount !== 4) {
    throw w.invalid(`${sequence.interpolation} interpolation needs 4 components, got ${componentCount}`, "componentCount");
  }
  if (keyframes.length === 0) {
    throw w.invalid("keyframe sequence has no keyframes", "keyframes");
  }
  if (!Number.isInteger(sequence.duration) || sequence.duration <= 0) {
    throw w.invalid(`duration ${sequence.duration} is not a positive number of milliseconds`, "duration");
  }
  keyframes.forEach((keyframe, i) => {
    if (keyframe.time < 0) {
      throw w.invalid(`keyframe time ${keyframe.time} is negative`, `keyframes[${i}].time`);
    }
    if (keyframe.value.length !== componentCount) {
      throw w.invalid(`keyframe has ${keyframe.value.length} components, expected ${componentCount}`, `keyframes[${i}].value`);
    }
    const previous = keyframes[i - 1];
    if (previous !== undefined && keyframe.time < previous.time) {
      throw w.invalid(`keyframe time ${keyframe.time} is before ${previous.time}`, `keyframes[${i}].time`);
    }
  });
  const first = sequence.validRange?.first ?? 0;
  const last = sequence.validRange?.last ?? keyframes.length - 1;
  if (first >= keyframes.length || last >= keyframes.length) {
    throw w.invalid(`valid range ${first}..${last} is outside ${keyframes.length} keyframes`, "validRange");
  }

  w.byte("interpolation", INTERPOLATION[sequence.interpolation]);
  w.byte("repeatMode", REPEAT_MODE[sequence.repeatMode ?? "constant"]);
  w.byte("encoding", KEYFRAME_ENCODING_RAW);
  w.uint32("duration", sequence.duration);
  w.uint32("validRange.first", first);
  w.uint32("validRange.last", last);
  w.uint32("componentCount", componentCount);
  w.uint32("keyframes.length", keyframes.length);
  keyframes.forEach((keyframe, i) => {
    w.int32(`keyframes[${i}].time`, keyframe.time);
    w.floats(`keyframes[${i}].value`, keyframe.value, componentCount);
  });
}
