/**
 * In-process stand-ins for the AWS SDK clients.
 *
 * A middleware at the front of the initialize step answers every command,
 * so requests never reach serialization, signing or the network.
 */
import type {
    SecretsManagerClient,
    ServiceInputTypes as SecretsInput,
    ServiceOutputTypes as SecretsOutput,
} from '@aws-sdk/client-secrets-manager'
import type {
    SSMClient,
    ServiceInputTypes as SsmInput,
    ServiceOutputTypes as SsmOutput,
} from '@aws-sdk/client-ssm'


export interface SentCommand<I> {

    /** Command class name, e.g. `GetParameterCommand` */
    command: string
    input: I
}


export type Responder<I, O> = (command: string, input: I) => O | Promise<O>


function commandNameOf(context: Record<string, unknown>): string {

    const name = context['commandName']

    return typeof name === 'string' ? name : 'unknown'
}


/**
 * Answer every SSM command with `respond` and record what was sent.
 */
export function stubSsm(client: SSMClient, respond: Responder<SsmInput, SsmOutput>): SentCommand<SsmInput>[] {

    const sent: SentCommand<SsmInput>[] = []

    client.middlewareStack.add(
        (_next, context) => async (args) => {

            const command = commandNameOf(context)

            sent.push({ command, input: args.input })

            return { output: await respond(command, args.input), response: {} }
        },
        { step: 'initialize', priority: 'high', name: 'stubSend' },
    )

    return sent
}


/**
 * Answer every secrets command with `respond` and record what was sent.
 */
export function stubSecretsManager(
    client: SecretsManagerClient,
    respond: Responder<SecretsInput, SecretsOutput>,
): SentCommand<SecretsInput>[] {

    const sent: SentCommand<SecretsInput>[] = []

    client.middlewareStack.add(
        (_next, context) => async (args) => {

            const command = commandNameOf(context)

            sent.push({ command, input: args.input })

            return { output: await respond(command, args.input), response: {} }
        },
        { step: 'initialize', priority: 'high', name: 'stubSend' },
    )

    return sent
}
