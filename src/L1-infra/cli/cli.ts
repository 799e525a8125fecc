import { Command, Option } from 'commander'

export { Command, Option }
