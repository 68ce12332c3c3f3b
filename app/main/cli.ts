import { main } from './main'

process.exitCode = main()
