#!/usr/bin/env tsx

import { exitWithError } from './helpers'
import { run } from './index'

run().catch(exitWithError)
