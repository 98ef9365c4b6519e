import { PropertyEnvironment } from "@palisade/config"
import { InvocationContext } from "../../core/context/invocation-context"
import { createInvocation } from "../../core/invocation/create-invocation"
import { SimpleKeyGenerator } from "../../core/keys/simple-key-generator"
import { MapRegistry } from "../../core/registry/map-registry"
import type { KeyGenerator } from "../../ports/key-generator"

export type MakeContextOptions = {
  positional?: unknown[]
  named?: Record<string, unknown>
  properties?: Record<string, string | undefined>
  keyGenerators?: Record<string, KeyGenerator>
}

export function makeContext(opts: MakeContextOptions = {}): InvocationContext {
  return new InvocationContext({
    invocation: createInvocation({
      method: { name: "findUser", owner: "UserRepository" },
      positional: opts.positional ?? [],
      named: opts.named ?? {},
      call: () => "result",
    }),
    environment: PropertyEnvironment.fromRecord(opts.properties ?? {}),
    keyGenerators: new MapRegistry("key generator", Object.entries(opts.keyGenerators ?? {})),
    defaultKeyGenerator: new SimpleKeyGenerator(),
  })
}
