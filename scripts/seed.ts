import 'dotenv/config'
import fs from 'fs'
import path from 'path'
import { loadConfig } from '../src/lib/config.js'

// Creates a small source tree under TCR_SOURCE_ROOT to try the CLI against.
const SAMPLE_MODELS = [
  { group: 'WGS_CSBD', folder: 'TS_01_Covid_WGS_CSBD_RULEEM000001_W04_sur' },
  { group: 'WGS_CSBD', folder: 'TS_02_Laterality Policy-Disgnosis to Diagnosis_WGS_CSBD_RULELATE000001_00W17_sur' },
  { group: 'GBDF', folder: 'TS_47_Covid_gbdf_mcr_RULEEM000001_v04_sur' },
]

const SAMPLE_FILES = ['TC#01_10001#deny.json', 'TC#02_10002#bypass.json', 'TC#03_10003#market.json', 'TC#04_10004#date.json']

async function main() {
  const config = loadConfig()
  for (const { group, folder } of SAMPLE_MODELS) {
    const dir = path.join(config.sourceRoot, group, folder, 'regression')
    fs.mkdirSync(dir, { recursive: true })
    for (const name of SAMPLE_FILES) {
      const body = { claimId: name.split('#')[1], lines: [{ code: '99213', units: 1 }] }
      fs.writeFileSync(path.join(dir, name), JSON.stringify(body, null, 2), 'utf8')
    }
  }

  console.log('Seeded:')
  for (const { group, folder } of SAMPLE_MODELS) console.log(` ${group}/${folder} (${SAMPLE_FILES.length} files)`)
}

main().catch((e)=>{ console.error(e); process.exit(1) })
