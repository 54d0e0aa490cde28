import type { TypedRecord } from "./attr-value.js"
import {
  boolAttr,
  type Decoder,
  floatAttr,
  intAttr,
  intListAttr,
  listOf,
  recordAttr,
  recordOf,
  stringAttr,
  stringListAttr
} from "./decode.js"

const nameDecoder = recordOf([stringAttr("first"), stringAttr("last")])

const addressDecoder = recordOf([
  stringAttr("street"),
  stringAttr("city"),
  stringAttr("country")
])

/**
 * Decoder for the sample user document shipped in `fixtures/users.json`.
 *
 * Field order of the result is the order listed here.
 */
export const userDecoder: Decoder<TypedRecord> = recordOf([
  intAttr("id"),
  recordAttr("name", nameDecoder),
  intAttr("age"),
  floatAttr("height"),
  boolAttr("active"),
  stringListAttr("tags"),
  intListAttr("scores"),
  recordAttr("address", addressDecoder)
])

export const usersDecoder: Decoder<ReadonlyArray<TypedRecord>> = listOf(userDecoder)
