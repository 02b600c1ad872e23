#!/usr/bin/env node
import { runMain } from 'citty'
import { main } from './cli'

void runMain(main)
