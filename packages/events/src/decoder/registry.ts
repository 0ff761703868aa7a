/**
 * Event registry: type id -> payload decoder
 *
 * Built once at startup and read-only afterwards, so one registry can be
 * shared by any number of concurrent decodes.
 */

import { DuplicateEventTypeError, UnknownEventTypeError } from "../errors.js";
import type { DecodedEventKind, EventOfKind } from "../models/events.js";
import type { BuiltinEventKind } from "../schemas/catalog.js";
import type { EventSchema, FieldSpec } from "../schemas/types.js";
import { validateSchema } from "../schemas/validate.js";
import { defineExternalDecoder, definePayloadDecoder, type PayloadDecoder } from "./payload.js";

/**
 * Dispatch table for built-in kinds. Every kind must appear here.
 */
type BuiltinDecoderTable = {
  readonly [K in BuiltinEventKind]: PayloadDecoder<EventOfKind<K>>;
};

const BUILTIN_DECODERS: BuiltinDecoderTable = {
  basalRateChange: definePayloadDecoder("basalRateChange"),
  pumpingSuspended: definePayloadDecoder("pumpingSuspended"),
  pumpingResumed: definePayloadDecoder("pumpingResumed"),
  bolusCompleted: definePayloadDecoder("bolusCompleted"),
  cartridgeFilled: definePayloadDecoder("cartridgeFilled"),
  dailyBasal: definePayloadDecoder("dailyBasal"),
  cgmDataGxb: definePayloadDecoder("cgmDataGxb"),
  basalDelivery: definePayloadDecoder("basalDelivery"),
  cgmDataG7: definePayloadDecoder("cgmDataG7"),
};

export interface RegistryOptions {
  /** Additional schemas supplied as configuration, decoded as kind "external" */
  external?: readonly EventSchema[];
}

/**
 * Catalogue entry describing one registered event type
 */
export interface RegisteredEventType {
  typeId: number;
  name: string;
  kind: DecodedEventKind;
  fields: readonly FieldSpec[];
}

export class EventRegistry {
  private constructor(private readonly decoders: ReadonlyMap<number, PayloadDecoder>) {}

  /**
   * Build a registry from the built-in kinds plus any external schemas.
   * Throws DuplicateEventTypeError or SchemaDefinitionError on a bad catalogue.
   */
  static create(options: RegistryOptions = {}): EventRegistry {
    const decoders = new Map<number, PayloadDecoder>();

    const register = (decoder: PayloadDecoder): void => {
      validateSchema(decoder.schema);
      const existing = decoders.get(decoder.typeId);
      if (existing) {
        throw new DuplicateEventTypeError(decoder.typeId, [existing.name, decoder.name]);
      }
      decoders.set(decoder.typeId, decoder);
    };

    for (const decoder of Object.values(BUILTIN_DECODERS)) {
      register(decoder);
    }
    for (const schema of options.external ?? []) {
      register(defineExternalDecoder(schema));
    }

    const registry = new EventRegistry(decoders);
    Object.freeze(registry);
    return registry;
  }

  /**
   * Decoder for a type id. Throws UnknownEventTypeError if none is registered.
   */
  lookup(typeId: number): PayloadDecoder {
    const decoder = this.decoders.get(typeId);
    if (!decoder) {
      throw new UnknownEventTypeError(typeId);
    }
    return decoder;
  }

  has(typeId: number): boolean {
    return this.decoders.has(typeId);
  }

  /** Registered type ids, ascending */
  get typeIds(): number[] {
    return [...this.decoders.keys()].sort((a, b) => a - b);
  }

  get size(): number {
    return this.decoders.size;
  }

  /**
   * Describe every registered type, ordered by type id
   */
  describe(): RegisteredEventType[] {
    return this.typeIds.map((typeId) => {
      const decoder = this.lookup(typeId);
      return {
        typeId,
        name: decoder.name,
        kind: decoder.kind,
        fields: decoder.schema.fields,
      };
    });
  }
}

let defaultRegistry: EventRegistry | undefined;

/**
 * Registry of the built-in kinds, created on first use
 */
export function getDefaultRegistry(): EventRegistry {
  defaultRegistry ??= EventRegistry.create();
  return defaultRegistry;
}
